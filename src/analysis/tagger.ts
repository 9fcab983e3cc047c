import { KeywordMap } from './types'

export type CategoryHits = Record<string, string[]>

/**
 * Match a sentence against every category's keywords.
 *
 * Matching is a plain case-insensitive substring test, so `terminat` covers
 * "terminate" and "termination". Only categories with at least one hit appear
 * in the result, and each keeps its keywords in configured order.
 */
export function tagSentence(sentence: string, keywords: KeywordMap): CategoryHits {
  const lower = sentence.toLowerCase()
  const hits: CategoryHits = {}
  for (const [category, kws] of Object.entries(keywords)) {
    const matched = kws.filter((kw) => lower.includes(kw.toLowerCase()))
    if (matched.length > 0) hits[category] = matched
  }
  return hits
}
