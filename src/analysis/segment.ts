import { normalizeText } from './normalize'
import { PageMap, SentenceRecord } from './types'

// Rule-based: split after terminal punctuation. Abbreviations ("e.g. ") and
// decimals followed by a space produce extra splits.
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/

export function splitSentences(text: string): string[] {
  if (!text) return []
  return text
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter(Boolean)
}

/** Page numbers in ascending numeric order, ignoring keys that are not integers. */
export function pageNumbers(pages: PageMap): number[] {
  return Object.keys(pages)
    .map(Number)
    .filter((n) => Number.isInteger(n))
    .sort((a, b) => a - b)
}

export function segmentPages(pages: PageMap): SentenceRecord[] {
  const out: SentenceRecord[] = []
  for (const page of pageNumbers(pages)) {
    for (const text of splitSentences(normalizeText(pages[page]))) {
      out.push({ text, page, orderIndex: out.length })
    }
  }
  return out
}

/** Pages are separated by form feeds, as `pdftotext` writes them. Blank pages are skipped. */
export function textToPages(text: string): PageMap {
  const pages: PageMap = {}
  text.split('\f').forEach((page, i) => {
    if (page.trim()) pages[i + 1] = page
  })
  return pages
}
