import ollama, { Ollama } from 'ollama'
import type { Summarizer, SummaryBounds } from './analysis/summarize'
import { debug, warn } from './logger'

const modelSettings: Record<string, { maxContext: number } | undefined> = {
  'llama3.2': {
    maxContext: 128000
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'gpt-oss:20b': {
    maxContext: 32000
  }
}

const MODEL_MAX_CTX = 128000

export const DEFAULT_SUMMARY_MODEL = 'llama3.2'

type ChatClient = Pick<Ollama, 'chat'>

export interface OllamaSummarizerOptions {
  model?: string
  /** Ollama server URL; the client library default is used when omitted. */
  host?: string
  retries?: number
}

const CATEGORY_PROMPT =
  'You summarize clauses taken from a terms and conditions document. The user message contains the clauses of one topic. ' +
  'Write a plain-language synopsis of what they mean for the user. Respond with the synopsis only, no preamble or lists.'

const DOCUMENT_PROMPT =
  'You write the overview of a terms and conditions document for a non-lawyer. The user message contains the most ' +
  'relevant clauses across all topics. Describe the overall picture and the biggest risks to the user instead of ' +
  'restating individual clauses. Respond with the overview only, no preamble or lists.'

export function summaryPrompt(bounds: SummaryBounds): string {
  const base = bounds.scope === 'document' ? DOCUMENT_PROMPT : CATEGORY_PROMPT
  return `${base} Use between ${bounds.minLength} and ${bounds.maxLength} words.`
}

async function callOllama(
  client: ChatClient,
  systemPrompt: string,
  userQuery: string,
  model: string,
  signal?: AbortSignal
): Promise<string> {
  const response = await client.chat({
    model,
    options: {
      num_ctx: modelSettings[model]?.maxContext || MODEL_MAX_CTX,
      temperature: 0
    },
    stream: true,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userQuery }
    ]
  })

  const stop = () => response.abort()
  if (signal?.aborted) stop()
  signal?.addEventListener('abort', stop, { once: true })
  try {
    let fullMessage = ''
    for await (const chunk of response) {
      if (chunk.message?.content) {
        fullMessage += chunk.message.content
      }
    }
    return fullMessage
  } finally {
    signal?.removeEventListener('abort', stop)
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

/**
 * Summarizer backed by a local Ollama model, retried with a small backoff.
 * Rejects once all attempts fail; `summarizeSafely` turns that into a fallback.
 * An aborted signal cancels the streaming request and skips remaining retries.
 */
export function createOllamaSummarizer(opts: OllamaSummarizerOptions = {}): Summarizer {
  const model = opts.model || DEFAULT_SUMMARY_MODEL
  const retries = opts.retries ?? 2
  const client: ChatClient = opts.host ? new Ollama({ host: opts.host }) : ollama

  return {
    async summarize(text, bounds, signal) {
      const systemPrompt = summaryPrompt(bounds)
      const tokenCount = (systemPrompt.length + text.length) / 4 // rough estimate
      debug('LLM token count', tokenCount)
      if (tokenCount > (modelSettings[model]?.maxContext || MODEL_MAX_CTX)) {
        warn(`LLM prompt token count (${tokenCount}) exceeds model max context. Prompt may be truncated or rejected.`)
      }

      let lastErr: unknown = null
      for (let attempt = 0; attempt <= retries; attempt++) {
        signal?.throwIfAborted()
        try {
          const raw = await callOllama(client, systemPrompt, text, model, signal)
          debug('LLM raw response', raw)
          const summary = raw.trim()
          if (!summary) throw new Error('LLM returned an empty summary')
          return summary
        } catch (err) {
          lastErr = err
          debug(`LLM attempt ${attempt} failed`, err)
          if (signal?.aborted) break
          if (attempt < retries) {
            await backoff(200 * (attempt + 1), signal)
          }
        }
      }
      signal?.throwIfAborted()
      throw lastErr instanceof Error ? lastErr : new Error(String(lastErr))
    }
  }
}
