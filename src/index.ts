export { analyzeClauses, buildRawText, processDocument } from './analysis/pipeline'
export type { ProcessOptions } from './analysis/pipeline'
export { defaultConfig, DEFAULT_KEYWORDS, DEFAULT_RISK_SCORES, resolveConfig } from './analysis/config'
export type { AnalyzerConfigInput } from './analysis/config'
export { getCategorySet, listCategorySets, DEFAULT_CATEGORY_SET } from './analysis/categorySets'
export { normalizeText } from './analysis/normalize'
export { segmentPages, splitSentences, textToPages } from './analysis/segment'
export { tagSentence } from './analysis/tagger'
export { band, compareBands, maxBand, scoreSentence } from './analysis/scorer'
export { collectCandidates, dedupeClauses, rankClauses } from './analysis/aggregate'
export { adaptiveSelection, fixedSelection, MAX_BULLETS } from './analysis/selection'
export type { SelectionPolicy } from './analysis/selection'
export { categoryRisk, overallRiskScore } from './analysis/rollup'
export { excerptSummarizer, summarizeSafely } from './analysis/summarize'
export type { Summarizer, SummaryBounds, SummaryScope } from './analysis/summarize'
export { highlightTerms, searchText } from './analysis/search'
export { documentJsonSchema, parseDocumentJson, toDocumentJson } from './analysis/serialize'
export type { DocumentJson } from './analysis/serialize'
export { createOllamaSummarizer } from './llm'
export { FileAnalysisStore } from './store/analysisStore'
export type { AnalysisStore, SavedAnalysis, SavedAnalysisSummary } from './store/analysisStore'
export * from './analysis/types'
export * from './errors'
