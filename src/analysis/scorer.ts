import { RiskBand, RiskWeights } from './types'

export const HIGH_RISK_THRESHOLD = 6
export const MEDIUM_RISK_THRESHOLD = 3

const BAND_RANK: Record<RiskBand, number> = { Low: 1, Medium: 2, High: 3 }

export interface SentenceScore {
  score: number
  triggers: string[]
}

/**
 * Sum the points of every weight-table phrase found in the sentence.
 * Overlapping phrases ("limit" inside "limitation of liability") each count.
 */
export function scoreSentence(sentence: string, weights: RiskWeights): SentenceScore {
  const lower = sentence.toLowerCase()
  let score = 0
  const triggers: string[] = []
  for (const [phrase, points] of Object.entries(weights)) {
    if (lower.includes(phrase.toLowerCase())) {
      score += points
      triggers.push(phrase)
    }
  }
  return { score, triggers }
}

export function band(score: number): RiskBand {
  if (score >= HIGH_RISK_THRESHOLD) return 'High'
  if (score >= MEDIUM_RISK_THRESHOLD) return 'Medium'
  return 'Low'
}

/** Low = 1, Medium = 2, High = 3. Also the weight used by the document rollup. */
export function bandRank(risk: RiskBand): number {
  return BAND_RANK[risk]
}

export function compareBands(a: RiskBand, b: RiskBand): number {
  return BAND_RANK[a] - BAND_RANK[b]
}

export function maxBand(bands: Iterable<RiskBand>): RiskBand {
  let max: RiskBand = 'Low'
  for (const b of bands) {
    if (compareBands(b, max) > 0) max = b
  }
  return max
}
