#!/usr/bin/env node
import fs from 'node:fs'
import fsp from 'node:fs/promises'
import { DEFAULT_CATEGORY_SET, getCategorySet } from './analysis/categorySets'
import { processDocument } from './analysis/pipeline'
import { searchText } from './analysis/search'
import { textToPages } from './analysis/segment'
import { toDocumentJson } from './analysis/serialize'
import type { Summarizer } from './analysis/summarize'
import { SelectionSetting } from './analysis/types'
import { loadEnv, readSettings, summarizerFromSettings } from './env'
import { errorMessage, NotFoundError, ValidationError } from './errors'
import { writeJsonAtomic } from './interfaces/atomicWrite'
import { error } from './logger'
import { AnalysisStore, FileAnalysisStore } from './store/analysisStore'
import { formatReport, formatRiskScore } from './report'

export interface CliDeps {
  store: AnalysisStore
  summarizer?: Summarizer
  summaryTimeoutMs?: number
  summaryInputLimit?: number
  print: (line: string) => void
}

type Flags = Record<string, string | true>

const BOOLEAN_FLAGS = new Set(['save'])

export function parseArgs(args: string[]): { positional: string[]; flags: Flags } {
  const positional: string[] = []
  const flags: Flags = {}
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!a.startsWith('--')) {
      positional.push(a)
      continue
    }
    const name = a.slice(2)
    const next = args[i + 1]
    if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith('--')) {
      flags[name] = next
      i++
    } else {
      flags[name] = true
    }
  }
  return { positional, flags }
}

function flagString(flags: Flags, name: string): string | undefined {
  const v = flags[name]
  if (v === true) throw new ValidationError(`--${name} needs a value`)
  return v
}

function parseId(raw: string | undefined): number {
  const id = Number(raw)
  if (!raw || !Number.isInteger(id) || id <= 0) throw new ValidationError(`Invalid analysis id: ${raw ?? ''}`)
  return id
}

export async function cmdAnalyze(input: string | undefined, flags: Flags, deps: CliDeps) {
  if (!input) throw new ValidationError('Usage: analyze <input.txt> [--set <name>] [--max-bullets <n>] [--out <file.json>] [--save]')
  if (!fs.existsSync(input)) throw new NotFoundError(`Input not found: ${input}`)

  const setName = flagString(flags, 'set') ?? DEFAULT_CATEGORY_SET
  const categories = getCategorySet(setName)

  let selection: SelectionSetting = { mode: 'adaptive' }
  const maxBullets = flagString(flags, 'max-bullets')
  if (maxBullets !== undefined) {
    const max = Number(maxBullets)
    if (!Number.isInteger(max) || max < 1 || max > 7) throw new ValidationError('--max-bullets must be between 1 and 7')
    selection = { mode: 'fixed', max }
  }

  const text = await fsp.readFile(input, 'utf8')
  const result = await processDocument(
    textToPages(text),
    { categories, selection },
    {
      summarizer: deps.summarizer,
      summaryTimeoutMs: deps.summaryTimeoutMs,
      summaryInputLimit: deps.summaryInputLimit
    }
  )
  const doc = toDocumentJson(result)
  deps.print(formatReport(doc))

  const out = flagString(flags, 'out')
  if (out) {
    await writeJsonAtomic(out, doc)
    deps.print(`Analysis JSON written to ${out}`)
  }
  if (flags.save) {
    const saved = await deps.store.save(setName, doc)
    deps.print(`Saved as analysis #${saved.id}`)
  }
  return doc
}

export async function cmdHistory(deps: CliDeps) {
  const items = await deps.store.list()
  if (items.length === 0) {
    deps.print('No saved analyses.')
    return
  }
  for (const item of items) {
    deps.print(`#${item.id}  ${item.documentType}  ${item.createdAt}  ${formatRiskScore(item.overallRiskScore)}`)
  }
}

export async function cmdShow(rawId: string | undefined, deps: CliDeps) {
  const id = parseId(rawId)
  const saved = await deps.store.get(id)
  if (!saved) throw new NotFoundError(`No saved analysis #${id}`)
  deps.print(formatReport(saved.result))
}

export async function cmdSearch(rawId: string | undefined, query: string | undefined, deps: CliDeps) {
  const id = parseId(rawId)
  if (!query) throw new ValidationError('Usage: search <id> <query>')
  const saved = await deps.store.get(id)
  if (!saved) throw new NotFoundError(`No saved analysis #${id}`)
  const matches = searchText(saved.result.raw_text, query)
  deps.print(`Found ${matches.length} matches.`)
  for (const m of matches) deps.print(`- ${m}`)
}

function usage(print: (line: string) => void) {
  print('Usage: clause-risk <command> [args]')
  print('Commands:')
  print('  analyze <input.txt> [--set <name>] [--max-bullets <n>] [--out <file.json>] [--save]')
  print('  history')
  print('  show <id>')
  print('  search <id> <query>')
}

export async function main(argv: string[], deps: CliDeps): Promise<number> {
  const { positional, flags } = parseArgs(argv)
  const [cmd, ...rest] = positional
  try {
    if (cmd === 'analyze') await cmdAnalyze(rest[0], flags, deps)
    else if (cmd === 'history') await cmdHistory(deps)
    else if (cmd === 'show') await cmdShow(rest[0], deps)
    else if (cmd === 'search') await cmdSearch(rest[0], rest.slice(1).join(' '), deps)
    else {
      usage(deps.print)
      return 1
    }
    return 0
  } catch (err) {
    error(errorMessage(err))
    return 1
  }
}

if (require.main === module) {
  loadEnv()
  const settings = readSettings()
  main(process.argv.slice(2), {
    store: new FileAnalysisStore(settings.dataDir),
    summarizer: summarizerFromSettings(settings),
    summaryTimeoutMs: settings.summaryTimeoutMs,
    summaryInputLimit: settings.summaryInputLimit,
    print: (line) => console.log(line)
  }).then((code) => {
    process.exitCode = code
  })
}
