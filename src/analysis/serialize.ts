import { z } from 'zod'
import { ValidationError } from '../errors'
import { DocumentResult, RISK_BANDS } from './types'

export const riskBandSchema = z.enum(RISK_BANDS)

export const clauseJsonSchema = z.object({
  text: z.string(),
  risk: riskBandSchema,
  rationale: z.array(z.string()),
  provenance: z.object({ location: z.string() })
})

export const categoryJsonSchema = z.object({
  category: z.string(),
  category_summary: z.string(),
  category_risk: riskBandSchema,
  bullets: z.array(clauseJsonSchema)
})

export const documentJsonSchema = z.object({
  ai_summary: z.string(),
  categories: z.array(categoryJsonSchema),
  raw_text: z.string(),
  overall_risk_score: z.number().min(0).max(100)
})

export type ClauseJson = z.infer<typeof clauseJsonSchema>
export type CategoryJson = z.infer<typeof categoryJsonSchema>
/** The exported / persisted form of a `DocumentResult`. */
export type DocumentJson = z.infer<typeof documentJsonSchema>

export function toDocumentJson(result: DocumentResult): DocumentJson {
  return {
    ai_summary: result.aiSummary,
    categories: result.categories.map((c) => ({
      category: c.category,
      category_summary: c.categorySummary,
      category_risk: c.categoryRisk,
      bullets: c.bullets.map((b) => ({
        text: b.text,
        risk: b.risk,
        rationale: [...b.rationale],
        provenance: { location: b.provenance.location }
      }))
    })),
    raw_text: result.rawText,
    overall_risk_score: result.overallRiskScore
  }
}

export function parseDocumentJson(value: unknown): DocumentJson {
  const parsed = documentJsonSchema.safeParse(value)
  if (!parsed.success) {
    throw new ValidationError(
      'Malformed analysis record',
      parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message }))
    )
  }
  return parsed.data
}
