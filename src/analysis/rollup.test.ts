import { describe, expect, it } from 'vitest'
import { categoryRisk, overallRiskScore } from './rollup'
import { ClauseRecord, RiskBand } from './types'

function clause(text: string, risk: RiskBand): ClauseRecord {
  return { text, risk, score: 0, rationale: [], riskTriggers: [], provenance: { location: 'Page 1' } }
}

describe('categoryRisk', () => {
  it('is Low without bullets', () => {
    expect(categoryRisk([])).toBe('Low')
  })

  it('takes the highest bullet band', () => {
    expect(categoryRisk([clause('a', 'Medium'), clause('b', 'High'), clause('c', 'Low')])).toBe('High')
  })
})

describe('overallRiskScore', () => {
  it('is zero when nothing was selected', () => {
    expect(overallRiskScore([])).toBe(0)
    expect(overallRiskScore([{ bullets: [] }, { bullets: [] }])).toBe(0)
  })

  it('weights High 3, Medium 2 and Low 1 against the maximum', () => {
    expect(overallRiskScore([{ bullets: [clause('x', 'High'), clause('y', 'Low')] }])).toBeCloseTo(200 / 3)
    expect(overallRiskScore([{ bullets: [clause('x', 'High')] }])).toBe(100)
    expect(overallRiskScore([{ bullets: [clause('x', 'Low')] }])).toBeCloseTo(100 / 3)
  })

  it('counts a clause shared by several categories once', () => {
    const shared = clause('shared', 'High')
    expect(overallRiskScore([{ bullets: [shared] }, { bullets: [shared, clause('other', 'Medium')] }])).toBeCloseTo(250 / 3)
  })

  it('stays within 0..100', () => {
    const bands: RiskBand[] = ['Low', 'Medium', 'High']
    for (let n = 1; n <= 9; n++) {
      const bullets = Array.from({ length: n }, (_, i) => clause(`c${i}`, bands[(i * 7) % 3]))
      const score = overallRiskScore([{ bullets }])
      expect(score).toBeGreaterThanOrEqual(0)
      expect(score).toBeLessThanOrEqual(100)
    }
  })
})
