import { highlightTerms } from './analysis/search'
import type { DocumentJson } from './analysis/serialize'

/** Wrap whole-word rationale terms in `**` for terminal output. */
export function emphasize(text: string, terms: readonly string[]) {
  return highlightTerms(text, terms)
    .map((seg) => (seg.match ? `**${seg.text}**` : seg.text))
    .join('')
}

export function formatRiskScore(score: number) {
  return `${score.toFixed(1)}/100`
}

/** Plain-text rendering of an analysis, categories without bullets skipped. */
export function formatReport(doc: DocumentJson): string {
  const lines: string[] = []
  lines.push(`Overall risk: ${formatRiskScore(doc.overall_risk_score)}`)
  if (doc.ai_summary) lines.push('', 'Summary:', doc.ai_summary)

  for (const c of doc.categories) {
    if (c.bullets.length === 0) continue
    lines.push('', `## ${c.category} [${c.category_risk}]`)
    if (c.category_summary) lines.push(c.category_summary)
    for (const b of c.bullets) {
      lines.push(`- ${b.risk} Risk: ${emphasize(b.text, b.rationale)} (${b.provenance.location})`)
    }
  }
  return lines.join('\n')
}
