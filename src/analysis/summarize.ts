import { debug, warn } from '../logger'
import { errorMessage } from '../errors'
import { splitSentences } from './segment'

export type SummaryScope = 'category' | 'document'

export interface SummaryBounds {
  /** Upper bound on the synopsis, in words. */
  maxLength: number
  minLength: number
  scope: SummaryScope
}

/**
 * An external text-summarization service. Implementations may be slow or
 * fail; callers go through `summarizeSafely`, which aborts `signal` once it
 * stops waiting. Implementations should then drop any work still in flight.
 */
export interface Summarizer {
  summarize(text: string, bounds: SummaryBounds, signal?: AbortSignal): Promise<string>
}

export interface SafeSummaryOptions {
  /** Characters of input passed to the summarizer. */
  inputLimit?: number
  timeoutMs?: number
}

export const CATEGORY_SUMMARY_BOUNDS: SummaryBounds = { maxLength: 60, minLength: 15, scope: 'category' }
export const DOCUMENT_SUMMARY_BOUNDS: SummaryBounds = { maxLength: 100, minLength: 30, scope: 'document' }

export const MIN_SUMMARY_INPUT = 40
export const DEFAULT_INPUT_LIMIT = 2048
export const DEFAULT_SUMMARY_TIMEOUT_MS = 30_000
const FALLBACK_EXCERPT = 250

export function fallbackSummary(text: string) {
  return text.slice(0, FALLBACK_EXCERPT) + '...'
}

class SummaryTimeoutError extends Error {
  constructor(ms: number) {
    super(`Summarizer did not answer within ${ms}ms`)
    this.name = 'SummaryTimeoutError'
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, controller: AbortController): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new SummaryTimeoutError(ms)
      controller.abort(err)
      reject(err)
    }, ms)
  })
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

/**
 * Ask the summarizer for a synopsis without ever rejecting. Short inputs are
 * returned unchanged; an error, a timeout or an empty answer yields the
 * truncated-excerpt fallback.
 */
export async function summarizeSafely(
  summarizer: Summarizer,
  text: string,
  bounds: SummaryBounds,
  opts: SafeSummaryOptions = {}
): Promise<string> {
  const input = text.trim()
  if (input.length < MIN_SUMMARY_INPUT) return input

  const limit = opts.inputLimit ?? DEFAULT_INPUT_LIMIT
  const timeoutMs = opts.timeoutMs ?? DEFAULT_SUMMARY_TIMEOUT_MS

  try {
    const controller = new AbortController()
    // the call itself may throw synchronously
    const pending = Promise.resolve().then(() => summarizer.summarize(input.slice(0, limit), bounds, controller.signal))
    const result: unknown = await withTimeout(pending, timeoutMs, controller)
    if (typeof result !== 'string' || result.trim() === '') {
      warn(`Summarizer returned no usable ${bounds.scope} summary; using excerpt`)
      return fallbackSummary(input)
    }
    return result.trim()
  } catch (err) {
    warn(`Summarizer failed for ${bounds.scope} summary: ${errorMessage(err)}`)
    debug('summarizer error', err)
    return fallbackSummary(input)
  }
}

/**
 * Offline summarizer: leading sentences of the input, cut to `maxLength` words.
 */
export const excerptSummarizer: Summarizer = {
  async summarize(text, { maxLength }) {
    const picked: string[] = []
    let words = 0
    for (const sentence of splitSentences(text)) {
      const count = sentence.split(/\s+/).length
      if (picked.length > 0 && words + count > maxLength) break
      picked.push(sentence)
      words += count
    }
    const out = picked.join(' ').split(/\s+/)
    return out.length > maxLength ? out.slice(0, maxLength).join(' ') + '...' : out.join(' ')
  }
}
