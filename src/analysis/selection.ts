import { SelectionSetting } from './types'

// No category ever shows more bullets than this, whatever the policy.
export const MAX_BULLETS = 7

/** Maps the number of candidate clauses in a category to how many to keep. */
export type SelectionPolicy = (candidateCount: number) => number

/**
 * Categories with more hits surface more clauses: two to start with, one more
 * per four candidates, never above MAX_BULLETS.
 */
export const adaptiveSelection: SelectionPolicy = (candidateCount) =>
  Math.min(MAX_BULLETS, 2 + Math.floor(candidateCount / 4))

export function fixedSelection(max: number): SelectionPolicy {
  return () => max
}

export function selectionPolicy(setting: SelectionSetting): SelectionPolicy {
  if (setting.mode === 'fixed') return fixedSelection(setting.max)
  return adaptiveSelection
}

/** Apply a policy, clamped to [0, MAX_BULLETS] and to the distinct clause count. */
export function selectionLimit(policy: SelectionPolicy, candidateCount: number, distinctCount: number): number {
  const wanted = Math.floor(policy(candidateCount))
  if (!Number.isFinite(wanted) || wanted <= 0) return 0
  return Math.min(wanted, MAX_BULLETS, distinctCount)
}
