import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_KEYWORDS, DEFAULT_RISK_SCORES, defaultConfig, resolveConfig } from './config'

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('resolveConfig', () => {
  it('uses the reference tables by default', () => {
    const cfg = resolveConfig()
    expect(cfg).toEqual(defaultConfig)
    expect('categories' in cfg).toBe(false)
    expect(Object.keys(cfg.keywords)).toHaveLength(11)
    expect(cfg.riskScores['sell data']).toBe(5)
  })

  it('replaces rather than merges caller keyword maps', () => {
    const cfg = resolveConfig({ keywords: { Termination: ['terminat'] } })
    expect(cfg.keywords).toEqual({ Termination: ['terminat'] })
    expect(cfg.riskScores).toBe(DEFAULT_RISK_SCORES)
  })

  it('drops malformed keyword lists and empty keywords', () => {
    const cfg = resolveConfig({ keywords: { Good: ['fee', ''], Bad: 'fee' } })
    expect(cfg.keywords).toEqual({ Good: ['fee'] })
    expect(console.warn).toHaveBeenCalled()
  })

  it('drops non-integer risk scores', () => {
    const cfg = resolveConfig({ riskScores: { refund: 2, waive: 1.5, monitor: 'high' } })
    expect(cfg.riskScores).toEqual({ refund: 2 })
  })

  it('falls back to adaptive selection on a bad setting', () => {
    expect(resolveConfig({ selection: { mode: 'fixed', max: 0 } }).selection).toEqual({ mode: 'adaptive' })
    expect(resolveConfig({ selection: { mode: 'fixed', max: 5 } }).selection).toEqual({ mode: 'fixed', max: 5 })
  })

  it('dedupes declared categories keeping the first', () => {
    expect(resolveConfig({ categories: ['A', 'B', 'A'] }).categories).toEqual(['A', 'B'])
  })

  it('ignores a config that is not an object', () => {
    expect(resolveConfig('nope')).toBe(defaultConfig)
    expect(resolveConfig(null).keywords).toBe(DEFAULT_KEYWORDS)
  })
})
