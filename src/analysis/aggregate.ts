import { band, scoreSentence } from './scorer'
import { SelectionPolicy, selectionLimit } from './selection'
import { tagSentence } from './tagger'
import { ClauseRecord, KeywordMap, RiskWeights, SentenceRecord } from './types'

export function pageLocation(page: number) {
  return `Page ${page}`
}

/**
 * Tag and score every sentence, grouping the resulting clauses by category.
 * Sentences that match no category are dropped before scoring. Within a
 * category, clauses keep sentence order so ranking ties stay deterministic.
 */
export function collectCandidates(
  sentences: SentenceRecord[],
  keywords: KeywordMap,
  weights: RiskWeights
): Map<string, ClauseRecord[]> {
  const perCategory = new Map<string, ClauseRecord[]>()
  const ordered = [...sentences].sort((a, b) => a.page - b.page || a.orderIndex - b.orderIndex)

  for (const sentence of ordered) {
    const hits = tagSentence(sentence.text, keywords)
    const categories = Object.keys(hits)
    if (categories.length === 0) continue

    const { score, triggers } = scoreSentence(sentence.text, weights)
    const risk = band(score)
    const location = pageLocation(sentence.page)

    for (const category of categories) {
      const clause: ClauseRecord = Object.freeze({
        text: sentence.text,
        risk,
        rationale: Object.freeze([...hits[category]]),
        riskTriggers: Object.freeze([...triggers]),
        provenance: Object.freeze({ location }),
        score
      })
      const list = perCategory.get(category)
      if (list) list.push(clause)
      else perCategory.set(category, [clause])
    }
  }
  return perCategory
}

/** Keep the first clause for each exact text. */
export function dedupeClauses(clauses: readonly ClauseRecord[]): ClauseRecord[] {
  const seen = new Set<string>()
  const out: ClauseRecord[] = []
  for (const clause of clauses) {
    if (seen.has(clause.text)) continue
    seen.add(clause.text)
    out.push(clause)
  }
  return out
}

/**
 * Dedupe, order by descending score (stable) and cut to the policy's limit.
 * The policy sees the candidate count before deduplication.
 */
export function rankClauses(candidates: readonly ClauseRecord[], policy: SelectionPolicy): ClauseRecord[] {
  const distinct = dedupeClauses(candidates)
  const sorted = distinct
    .map((clause, index) => ({ clause, index }))
    .sort((a, b) => b.clause.score - a.clause.score || a.index - b.index)
    .map(({ clause }) => clause)
  return sorted.slice(0, selectionLimit(policy, candidates.length, distinct.length))
}
