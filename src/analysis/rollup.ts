import { bandRank, maxBand } from './scorer'
import { ClauseRecord, RiskBand } from './types'

export function categoryRisk(bullets: readonly ClauseRecord[]): RiskBand {
  return maxBand(bullets.map((b) => b.risk))
}

/**
 * Weighted 0-100 risk over the distinct selected clauses of the document.
 * A sentence listed under several categories is counted once.
 */
export function overallRiskScore(categories: ReadonlyArray<{ bullets: readonly ClauseRecord[] }>): number {
  const byText = new Map<string, RiskBand>()
  for (const { bullets } of categories) {
    for (const clause of bullets) {
      if (!byText.has(clause.text)) byText.set(clause.text, clause.risk)
    }
  }
  if (byText.size === 0) return 0

  let weighted = 0
  for (const risk of byText.values()) weighted += bandRank(risk)
  const maxPossible = bandRank('High') * byText.size
  return (100 * weighted) / maxPossible
}
