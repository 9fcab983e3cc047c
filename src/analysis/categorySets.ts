import categorySets from '../../data/category-sets.json'
import { UnknownCategorySetError } from '../errors'

const CATEGORY_SETS: Record<string, string[]> = categorySets

export const DEFAULT_CATEGORY_SET = 'Software ToS'

export function listCategorySets(): string[] {
  return Object.keys(CATEGORY_SETS)
}

export function getCategorySet(name: string): string[] {
  const set = Object.hasOwn(CATEGORY_SETS, name) ? CATEGORY_SETS[name] : undefined
  if (!set) throw new UnknownCategorySetError(name)
  return [...set]
}
