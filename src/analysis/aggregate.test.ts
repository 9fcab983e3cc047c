import { describe, expect, it } from 'vitest'
import { collectCandidates, dedupeClauses, rankClauses } from './aggregate'
import { band } from './scorer'
import { adaptiveSelection, fixedSelection } from './selection'
import { ClauseRecord } from './types'

function clause(text: string, score: number, location = 'Page 1'): ClauseRecord {
  return { text, score, risk: band(score), rationale: [], riskTriggers: [], provenance: { location } }
}

describe('rankClauses', () => {
  it('dedupes, sorts by score and keeps ties in original order', () => {
    const ranked = rankClauses([clause('a', 1), clause('b', 5), clause('a', 1), clause('c', 5)], adaptiveSelection)
    expect(ranked.map((c) => c.text)).toEqual(['b', 'c', 'a'])
  })

  it('keeps the first occurrence of duplicated text', () => {
    const ranked = rankClauses([clause('same', 3, 'Page 1'), clause('same', 3, 'Page 2')], adaptiveSelection)
    expect(ranked).toHaveLength(1)
    expect(ranked[0].provenance.location).toBe('Page 1')
  })

  it('treats texts differing only in case as distinct', () => {
    expect(rankClauses([clause('Same', 1), clause('same', 1)], adaptiveSelection)).toHaveLength(2)
  })

  it('caps output at seven bullets', () => {
    const many = Array.from({ length: 40 }, (_, i) => clause(`clause ${i}`, i))
    const ranked = rankClauses(many, adaptiveSelection)
    expect(ranked).toHaveLength(7)
    expect(ranked.map((c) => c.score)).toEqual([39, 38, 37, 36, 35, 34, 33])
  })

  it('never shows more bullets than distinct candidates', () => {
    const repeated = Array.from({ length: 8 }, () => clause('again', 2))
    expect(rankClauses(repeated, adaptiveSelection)).toHaveLength(1)
  })

  it('uses the candidate count before dedup for the adaptive cap', () => {
    // 8 candidates -> cap of 4, even though only 5 are distinct
    const candidates = ['a', 'b', 'c', 'd', 'e', 'a', 'b', 'c'].map((t) => clause(t, 0))
    expect(rankClauses(candidates, adaptiveSelection).map((c) => c.text)).toEqual(['a', 'b', 'c', 'd'])
  })

  it('supports a fixed cap', () => {
    const five = ['a', 'b', 'c', 'd', 'e'].map((t, i) => clause(t, i))
    expect(rankClauses(five, fixedSelection(3)).map((c) => c.text)).toEqual(['e', 'd', 'c'])
  })
})

describe('dedupeClauses', () => {
  it('keeps first-seen order', () => {
    expect(dedupeClauses([clause('x', 0), clause('y', 0), clause('x', 9)]).map((c) => [c.text, c.score])).toEqual([
      ['x', 0],
      ['y', 0]
    ])
  })
})

describe('collectCandidates', () => {
  const keywords = { Termination: ['terminat'], Billing: ['fee', 'terminat'] }
  const weights = { 'early termination fee': 4, terminat: 1 }

  it('tags, scores and groups sentences per category', () => {
    const out = collectCandidates(
      [
        { text: 'We may terminate your account.', page: 1, orderIndex: 0 },
        { text: 'Unrelated sentence.', page: 1, orderIndex: 1 },
        { text: 'An early termination fee applies.', page: 2, orderIndex: 2 }
      ],
      keywords,
      weights
    )
    expect([...out.keys()]).toEqual(['Termination', 'Billing'])
    expect(out.get('Termination')).toEqual([
      { text: 'We may terminate your account.', risk: 'Low', rationale: ['terminat'], riskTriggers: ['terminat'], provenance: { location: 'Page 1' }, score: 1 },
      {
        text: 'An early termination fee applies.',
        risk: 'Medium',
        rationale: ['terminat'],
        riskTriggers: ['early termination fee', 'terminat'],
        provenance: { location: 'Page 2' },
        score: 5
      }
    ])
    expect(out.get('Billing')?.map((c) => c.rationale)).toEqual([['terminat'], ['fee', 'terminat']])
  })

  it('orders candidates by page and sentence order', () => {
    const out = collectCandidates(
      [
        { text: 'Second terminate.', page: 2, orderIndex: 1 },
        { text: 'First terminate.', page: 1, orderIndex: 0 }
      ],
      keywords,
      weights
    )
    expect(out.get('Termination')?.map((c) => c.text)).toEqual(['First terminate.', 'Second terminate.'])
  })

  it('returns frozen clauses', () => {
    const out = collectCandidates([{ text: 'We terminate.', page: 1, orderIndex: 0 }], keywords, weights)
    const first = out.get('Termination')?.[0]
    expect(Object.isFrozen(first)).toBe(true)
    expect(Object.isFrozen(first?.rationale)).toBe(true)
  })
})
