import cors from 'cors'
import express, { NextFunction, Request, Response } from 'express'
import type { Server } from 'http'
import { z } from 'zod'
import { DEFAULT_CATEGORY_SET, getCategorySet, listCategorySets } from './analysis/categorySets'
import { processDocument } from './analysis/pipeline'
import { highlightTerms, searchText } from './analysis/search'
import { textToPages } from './analysis/segment'
import { toDocumentJson } from './analysis/serialize'
import { MAX_BULLETS } from './analysis/selection'
import type { Summarizer } from './analysis/summarize'
import { PageMap, SelectionSetting } from './analysis/types'
import { loadEnv, readSettings, summarizerFromSettings } from './env'
import { AppError, errorMessage, NotFoundError, ValidationError } from './errors'
import { error, info } from './logger'
import { AnalysisStore, FileAnalysisStore } from './store/analysisStore'

export interface AppDeps {
  store: AnalysisStore
  summarizer?: Summarizer
  summaryTimeoutMs?: number
  summaryInputLimit?: number
}

const analyzeBodySchema = z
  .object({
    text: z.string().optional(),
    pages: z.record(z.string().regex(/^\d+$/, 'page keys must be page numbers'), z.string()).optional(),
    documentType: z.string().default(DEFAULT_CATEGORY_SET),
    maxBullets: z.number().int().min(1).max(MAX_BULLETS).optional(),
    save: z.boolean().default(false)
  })
  .refine((b) => b.text !== undefined || b.pages !== undefined, { message: 'Provide text or pages' })

function toPages(body: { text?: string; pages?: Record<string, string> }): PageMap {
  if (body.pages) {
    const pages: PageMap = {}
    for (const [k, v] of Object.entries(body.pages)) pages[Number(k)] = v
    return pages
  }
  return textToPages(body.text ?? '')
}

function parseIdParam(raw: string): number {
  const id = Number(raw)
  if (!Number.isInteger(id) || id <= 0) throw new ValidationError(`Invalid analysis id: ${raw}`)
  return id
}

// express 4 does not forward rejected promises to the error handler
type AsyncHandler = (req: Request, res: Response) => Promise<unknown>
const route = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next)
}

export function createApp(deps: AppDeps) {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '5mb' }))

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true })
  })

  app.get('/api/category-sets', (_req: Request, res: Response) => {
    res.json(Object.fromEntries(listCategorySets().map((name) => [name, getCategorySet(name)])))
  })

  app.post(
    '/api/analyze',
    route(async (req, res) => {
      const parsed = analyzeBodySchema.safeParse(req.body)
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid analyze request',
          parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message }))
        )
      }
      const body = parsed.data
      const categories = getCategorySet(body.documentType)
      const selection: SelectionSetting =
        body.maxBullets !== undefined ? { mode: 'fixed', max: body.maxBullets } : { mode: 'adaptive' }

      const result = await processDocument(
        toPages(body),
        { categories, selection },
        {
          summarizer: deps.summarizer,
          summaryTimeoutMs: deps.summaryTimeoutMs,
          summaryInputLimit: deps.summaryInputLimit
        }
      )
      const doc = toDocumentJson(result)
      if (body.save) {
        const saved = await deps.store.save(body.documentType, doc)
        res.status(201).json({ id: saved.id, ...doc })
        return
      }
      res.json(doc)
    })
  )

  app.get(
    '/api/analyses',
    route(async (_req, res) => {
      res.json(await deps.store.list())
    })
  )

  app.get(
    '/api/analyses/:id',
    route(async (req, res) => {
      const id = parseIdParam(req.params.id)
      const saved = await deps.store.get(id)
      if (!saved) throw new NotFoundError(`No saved analysis #${id}`)
      res.json(saved)
    })
  )

  app.get(
    '/api/analyses/:id/search',
    route(async (req, res) => {
      const id = parseIdParam(req.params.id)
      const q = typeof req.query.q === 'string' ? req.query.q : ''
      const saved = await deps.store.get(id)
      if (!saved) throw new NotFoundError(`No saved analysis #${id}`)
      const matches = searchText(saved.result.raw_text, q).map((sentence) => ({
        sentence,
        segments: highlightTerms(sentence, [q])
      }))
      res.json({ query: q, count: matches.length, matches })
    })
  )

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json(err.toJSON())
      return
    }
    // body-parser rejects malformed JSON with a 400
    if (err instanceof SyntaxError) {
      res.status(400).json(new ValidationError('Malformed JSON body').toJSON())
      return
    }
    error('Unhandled request error', err)
    res.status(500).json({ code: 'INTERNAL_ERROR', message: errorMessage(err) })
  })

  return app
}

export function startServer(deps: AppDeps, port: number): Server {
  const app = createApp(deps)
  return app.listen(port, () => {
    info(`Clause risk API listening on http://localhost:${port}`)
  })
}

if (require.main === module) {
  loadEnv()
  const settings = readSettings()
  startServer(
    {
      store: new FileAnalysisStore(settings.dataDir),
      summarizer: summarizerFromSettings(settings),
      summaryTimeoutMs: settings.summaryTimeoutMs,
      summaryInputLimit: settings.summaryInputLimit
    },
    settings.port
  )
}
