import { normalizeText } from './normalize'
import { splitSentences } from './segment'

const PAGE_MARKER = /^\s*--- Page \d+ ---\s*$/gm

export function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Sentences of an analysed document's raw text that contain `query`
 * (case-insensitive). Page markers are not part of any sentence.
 */
export function searchText(rawText: string, query: string): string[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return []
  const text = normalizeText(rawText.replace(PAGE_MARKER, '\n\n'))
  return splitSentences(text).filter((s) => s.toLowerCase().includes(needle))
}

const WORD_CHAR = /\w/

// \b only holds next to a word character, so "c++" or "opt-out." get no boundary on that side
function wordPattern(term: string) {
  const start = WORD_CHAR.test(term[0]) ? '\\b' : ''
  const end = WORD_CHAR.test(term[term.length - 1]) ? '\\b' : ''
  return `${start}${escapeRegExp(term)}${end}`
}

export interface HighlightSegment {
  text: string
  match: boolean
}

/**
 * Split `text` into plain and highlighted segments. Unlike the tagger, terms
 * only match as whole words, so "share" does not light up inside "shareholder".
 */
export function highlightTerms(text: string, terms: readonly string[]): HighlightSegment[] {
  const words = [...new Set(terms.map((t) => t.trim()).filter(Boolean))]
  if (!text) return []
  if (words.length === 0) return [{ text, match: false }]

  // longest first so "third party" wins over "third"
  words.sort((a, b) => b.length - a.length)
  const pattern = new RegExp(words.map(wordPattern).join('|'), 'gi')

  const out: HighlightSegment[] = []
  let last = 0
  for (const m of text.matchAll(pattern)) {
    const start = m.index ?? 0
    if (start > last) out.push({ text: text.slice(last, start), match: false })
    out.push({ text: m[0], match: true })
    last = start + m[0].length
  }
  if (last < text.length) out.push({ text: text.slice(last), match: false })
  return out
}
