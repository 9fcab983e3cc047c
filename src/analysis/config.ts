import { z } from 'zod'
import defaultKeywords from '../../data/keywords.json'
import defaultRiskScores from '../../data/risk-scores.json'
import { warn } from '../logger'
import { MAX_BULLETS } from './selection'
import { AnalyzerConfig, KeywordMap, RiskWeights, SelectionSetting } from './types'

export const DEFAULT_KEYWORDS: KeywordMap = defaultKeywords
export const DEFAULT_RISK_SCORES: RiskWeights = defaultRiskScores

export const defaultConfig: AnalyzerConfig = {
  keywords: DEFAULT_KEYWORDS,
  riskScores: DEFAULT_RISK_SCORES,
  selection: { mode: 'adaptive' }
}

export const selectionSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('adaptive') }),
  z.object({ mode: z.literal('fixed'), max: z.number().int().min(1).max(MAX_BULLETS) })
])

const keywordListSchema = z.array(z.string())
const pointsSchema = z.number().int()

export type AnalyzerConfigInput = Partial<AnalyzerConfig>

function resolveCategories(value: unknown): string[] | undefined {
  if (value === undefined) return undefined
  const parsed = z.array(z.string()).safeParse(value)
  if (!parsed.success) {
    warn('Ignoring invalid categories; falling back to keyword order')
    return undefined
  }
  // first declaration wins
  return [...new Set(parsed.data)]
}

function resolveKeywords(value: unknown): KeywordMap {
  if (value === undefined) return DEFAULT_KEYWORDS
  const record = z.record(z.string(), z.unknown()).safeParse(value)
  if (!record.success) {
    warn('Ignoring invalid keyword map; using defaults')
    return DEFAULT_KEYWORDS
  }
  const out: KeywordMap = {}
  for (const [category, list] of Object.entries(record.data)) {
    const parsed = keywordListSchema.safeParse(list)
    if (!parsed.success) {
      warn(`Ignoring keywords for "${category}": expected a list of strings`)
      continue
    }
    // an empty keyword would match every sentence
    out[category] = parsed.data.filter((kw) => kw.trim() !== '')
  }
  return out
}

function resolveRiskScores(value: unknown): RiskWeights {
  if (value === undefined) return DEFAULT_RISK_SCORES
  const record = z.record(z.string(), z.unknown()).safeParse(value)
  if (!record.success) {
    warn('Ignoring invalid risk score table; using defaults')
    return DEFAULT_RISK_SCORES
  }
  const out: RiskWeights = {}
  for (const [phrase, points] of Object.entries(record.data)) {
    const parsed = pointsSchema.safeParse(points)
    if (!parsed.success || phrase.trim() === '') {
      warn(`Ignoring risk score for "${phrase}": expected an integer`)
      continue
    }
    out[phrase] = parsed.data
  }
  return out
}

function resolveSelection(value: unknown): SelectionSetting {
  if (value === undefined) return defaultConfig.selection
  const parsed = selectionSchema.safeParse(value)
  if (!parsed.success) {
    warn('Ignoring invalid selection setting; using adaptive selection')
    return defaultConfig.selection
  }
  return parsed.data
}

/**
 * Validate a caller-supplied configuration once, field by field. Anything
 * malformed falls back to its default with a warning; this never throws.
 */
export function resolveConfig(input?: unknown): AnalyzerConfig {
  const record = z.record(z.string(), z.unknown()).safeParse(input ?? {})
  if (!record.success) {
    warn('Ignoring invalid analyzer config; using defaults')
    return defaultConfig
  }
  const raw = record.data
  const categories = resolveCategories(raw.categories)
  return {
    ...(categories && { categories }),
    keywords: resolveKeywords(raw.keywords),
    riskScores: resolveRiskScores(raw.riskScores),
    selection: resolveSelection(raw.selection)
  }
}
