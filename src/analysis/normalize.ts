/**
 * Clean raw page text before sentence splitting.
 *
 * Hyphenated line breaks are joined, single line breaks become spaces,
 * control characters are dropped and whitespace runs are collapsed.
 * Running it twice gives the same result as running it once.
 */
export function normalizeText(raw: string | null | undefined): string {
  if (typeof raw !== 'string' || !raw) return ''
  return raw
    .replace(/\r\n?/g, '\n')
    .replace(/-[^\S\n]*\n\s*/g, '')
    .replace(/(?<!\n)\n(?!\n)/g, ' ')
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\s{2,}/g, ' ')
    .trim()
}
