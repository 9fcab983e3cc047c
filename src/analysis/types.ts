// Data model for the clause analysis pipeline

export const RISK_BANDS = ['Low', 'Medium', 'High'] as const

export type RiskBand = (typeof RISK_BANDS)[number]

// category -> case-insensitive substring keywords
export type KeywordMap = Record<string, string[]>

// trigger phrase -> integer points
export type RiskWeights = Record<string, number>

export type PageMap = Record<number, string | null | undefined>

export interface SentenceRecord {
  text: string
  page: number
  orderIndex: number
}

export interface Provenance {
  location: string
}

export interface ClauseRecord {
  readonly text: string
  readonly risk: RiskBand
  /** Category keywords that placed the clause in its category. */
  readonly rationale: readonly string[]
  /** Weight-table keys that contributed to `score`. */
  readonly riskTriggers: readonly string[]
  readonly provenance: Provenance
  readonly score: number
}

export interface CategoryResult {
  category: string
  categorySummary: string
  categoryRisk: RiskBand
  bullets: ClauseRecord[]
}

export interface DocumentResult {
  aiSummary: string
  categories: CategoryResult[]
  rawText: string
  overallRiskScore: number // [0,100]
}

/** Result of the synchronous stages, before any summarization. */
export interface ClauseAnalysis {
  categories: Array<Omit<CategoryResult, 'categorySummary'>>
  rawText: string
  overallRiskScore: number
}

export type SelectionSetting = { mode: 'adaptive' } | { mode: 'fixed'; max: number }

export interface AnalyzerConfig {
  /** Declared output order. When omitted, keyword-map order is used and empty categories are dropped. */
  categories?: string[]
  keywords: KeywordMap
  riskScores: RiskWeights
  selection: SelectionSetting
}
