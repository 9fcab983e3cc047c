import { debug } from '../logger'
import { collectCandidates, rankClauses } from './aggregate'
import { AnalyzerConfigInput, resolveConfig } from './config'
import { categoryRisk, overallRiskScore } from './rollup'
import { pageNumbers, segmentPages } from './segment'
import { selectionPolicy } from './selection'
import {
  CATEGORY_SUMMARY_BOUNDS,
  DOCUMENT_SUMMARY_BOUNDS,
  excerptSummarizer,
  summarizeSafely,
  Summarizer
} from './summarize'
import { AnalyzerConfig, ClauseAnalysis, DocumentResult, PageMap } from './types'

export interface ProcessOptions {
  /** Defaults to the offline excerpt summarizer. */
  summarizer?: Summarizer
  summaryTimeoutMs?: number
  summaryInputLimit?: number
}

export function buildRawText(pages: PageMap): string {
  let raw = ''
  for (const page of pageNumbers(pages)) {
    raw += `\n--- Page ${page} ---\n${pages[page] ?? ''}`
  }
  return raw.trim()
}

/**
 * Tagging, scoring, ranking and rollups. Synchronous and free of I/O.
 *
 * With declared categories every one of them is returned in declared order,
 * empty or not; otherwise categories follow the keyword map and empty ones
 * are left out.
 */
export function analyzeClauses(pages: PageMap, config: AnalyzerConfig): ClauseAnalysis {
  const sentences = segmentPages(pages)
  const candidates = collectCandidates(sentences, config.keywords, config.riskScores)
  const policy = selectionPolicy(config.selection)
  const declared = config.categories !== undefined

  const categories: ClauseAnalysis['categories'] = []
  for (const category of config.categories ?? Object.keys(config.keywords)) {
    const bullets = rankClauses(candidates.get(category) ?? [], policy)
    if (!declared && bullets.length === 0) continue
    categories.push({ category, categoryRisk: categoryRisk(bullets), bullets })
  }

  debug('analyzeClauses', { sentences: sentences.length, categories: categories.length })
  return {
    categories,
    rawText: buildRawText(pages),
    overallRiskScore: overallRiskScore(categories)
  }
}

/**
 * Full document analysis. Always resolves: malformed pages or config degrade
 * to an empty result, and summarizer failures become excerpt fallbacks.
 */
export async function processDocument(
  pages: PageMap | null | undefined,
  config: AnalyzerConfigInput = {},
  options: ProcessOptions = {}
): Promise<DocumentResult> {
  const analysis = analyzeClauses(pages ?? {}, resolveConfig(config))

  const summarizer = options.summarizer ?? excerptSummarizer
  const safeOpts = { timeoutMs: options.summaryTimeoutMs, inputLimit: options.summaryInputLimit }

  const categories = await Promise.all(
    analysis.categories.map(async (c) => {
      const { category, categoryRisk, bullets } = c
      if (bullets.length === 0) return { category, categorySummary: '', categoryRisk, bullets }
      const text = bullets.map((b) => b.text).join(' ')
      const categorySummary = await summarizeSafely(summarizer, text, CATEGORY_SUMMARY_BOUNDS, safeOpts)
      return { category, categorySummary, categoryRisk, bullets }
    })
  )

  // a clause selected under several categories is sent once
  const globalText = [...new Set(analysis.categories.flatMap((c) => c.bullets.map((b) => b.text)))].join(' ')
  const aiSummary = globalText
    ? await summarizeSafely(summarizer, globalText, DOCUMENT_SUMMARY_BOUNDS, safeOpts)
    : ''

  return {
    aiSummary,
    categories,
    rawText: analysis.rawText,
    overallRiskScore: analysis.overallRiskScore
  }
}
