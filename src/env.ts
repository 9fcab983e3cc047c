import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import path from 'path'
import { DEFAULT_INPUT_LIMIT, DEFAULT_SUMMARY_TIMEOUT_MS, Summarizer } from './analysis/summarize'
import { createOllamaSummarizer } from './llm'
import { warn } from './logger'

export interface Settings {
  port: number
  dataDir: string
  ollamaHost?: string
  /** Set when summaries should come from Ollama rather than the excerpt summarizer. */
  summaryModel?: string
  summaryTimeoutMs: number
  summaryInputLimit: number
}

let loaded = false

/** Load `.env`, `.env.local`, `.env.<NODE_ENV>` ... from the project root once. */
export function loadEnv() {
  if (loaded) return
  loaded = true
  dotenv.config({ path: appRootPath.path, silent: true })
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) {
    warn(`Ignoring ${name}=${raw}: expected a positive integer`)
    return fallback
  }
  return n
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: positiveInt('PORT', env.PORT, 3001),
    dataDir: path.resolve(appRootPath.path, env.DATA_DIR || path.join('.tmp', 'analyses')),
    ollamaHost: env.OLLAMA_HOST || undefined,
    summaryModel: env.SUMMARY_MODEL || undefined,
    summaryTimeoutMs: positiveInt('SUMMARY_TIMEOUT_MS', env.SUMMARY_TIMEOUT_MS, DEFAULT_SUMMARY_TIMEOUT_MS),
    summaryInputLimit: positiveInt('SUMMARY_INPUT_LIMIT', env.SUMMARY_INPUT_LIMIT, DEFAULT_INPUT_LIMIT)
  }
}

/** Ollama when a host or model is configured, otherwise undefined (excerpt summaries). */
export function summarizerFromSettings(settings: Settings): Summarizer | undefined {
  if (!settings.ollamaHost && !settings.summaryModel) return undefined
  return createOllamaSummarizer({ host: settings.ollamaHost, model: settings.summaryModel })
}
