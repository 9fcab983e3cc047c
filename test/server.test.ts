import fs from 'node:fs/promises'
import type { Server } from 'node:http'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { parseDocumentJson } from '../src/analysis/serialize'
import { createApp } from '../src/server'
import { FileAnalysisStore, savedAnalysisSchema } from '../src/store/analysisStore'

const SAMPLE = [
  'We collect personal data when you use the service.\nWe may share your data with advertising partners.',
  'You agree not to reverse engineer the app. Disputes are settled by binding arbitration and you waive any class action.'
].join('\f')

let dir: string
let srv: Server
let url: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clause-api-'))
  const app = createApp({ store: new FileAnalysisStore(dir, () => new Date('2026-05-06T07:08:09.000Z')) })
  srv = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s))
  })
  const addr = srv.address()
  if (addr === null || typeof addr === 'string') throw new Error('expected a TCP address')
  url = `http://127.0.0.1:${addr.port}`
})

afterEach(async () => {
  vi.restoreAllMocks()
  await new Promise<void>((resolve) => srv.close(() => resolve()))
  await fs.rm(dir, { recursive: true, force: true })
})

function post(route: string, body: string) {
  return fetch(`${url}${route}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body })
}

describe('clause risk API', () => {
  it('answers the health check', async () => {
    const res = await fetch(`${url}/api/health`)
    expect(await res.json()).toEqual({ ok: true })
  })

  it('lists category sets', async () => {
    const res = await fetch(`${url}/api/category-sets`)
    const body = z.record(z.array(z.string())).parse(await res.json())
    expect(Object.keys(body)).toEqual(['Software ToS', 'Privacy Policy', 'All'])
    expect(body['Privacy Policy']).toHaveLength(5)
  })

  it('analyzes text without saving', async () => {
    const res = await post('/api/analyze', JSON.stringify({ text: SAMPLE, maxBullets: 1 }))
    expect(res.status).toBe(200)
    const raw = await res.json()
    expect(raw).not.toHaveProperty('id')
    const body = parseDocumentJson(raw)
    expect(body.overall_risk_score).toBe(50)
    expect(body.raw_text.startsWith('--- Page 1 ---\nWe collect personal data')).toBe(true)
    expect(await (await fetch(`${url}/api/analyses`)).json()).toEqual([])
  })

  it('analyzes explicit pages', async () => {
    const res = await post(
      '/api/analyze',
      JSON.stringify({ pages: { '3': 'We may terminate your account at any time.' }, documentType: 'All' })
    )
    const body = parseDocumentJson(await res.json())
    const termination = body.categories.find((c) => c.category === 'Termination')
    expect(termination?.bullets[0].provenance).toEqual({ location: 'Page 3' })
    expect(body.categories).toHaveLength(11)
  })

  it('saves, lists, fetches and searches an analysis', async () => {
    const res = await post('/api/analyze', JSON.stringify({ text: SAMPLE, save: true }))
    expect(res.status).toBe(201)
    expect(await res.json()).toMatchObject({ id: 1, overall_risk_score: 50 })

    expect(await (await fetch(`${url}/api/analyses`)).json()).toEqual([
      { id: 1, documentType: 'Software ToS', createdAt: '2026-05-06T07:08:09.000Z', overallRiskScore: 50 }
    ])

    const saved = savedAnalysisSchema.parse(await (await fetch(`${url}/api/analyses/1`)).json())
    expect(saved.result.overall_risk_score).toBe(50)

    const search = await (await fetch(`${url}/api/analyses/1/search?q=share`)).json()
    expect(search).toEqual({
      query: 'share',
      count: 1,
      matches: [
        {
          sentence: 'We may share your data with advertising partners.',
          segments: [
            { text: 'We may ', match: false },
            { text: 'share', match: true },
            { text: ' your data with advertising partners.', match: false }
          ]
        }
      ]
    })
  })

  it('returns 404 for a missing analysis', async () => {
    const res = await fetch(`${url}/api/analyses/9`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ code: 'NOT_FOUND', message: 'No saved analysis #9' })
  })

  it('rejects an invalid id', async () => {
    const res = await fetch(`${url}/api/analyses/abc`)
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ code: 'VALIDATION_ERROR', message: 'Invalid analysis id: abc' })
  })

  it('rejects a body without text or pages', async () => {
    const res = await post('/api/analyze', '{}')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid analyze request',
      details: [{ field: '', message: 'Provide text or pages' }]
    })
  })

  it('rejects an unknown category set', async () => {
    const res = await post('/api/analyze', JSON.stringify({ text: SAMPLE, documentType: 'Recipes' }))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ code: 'UNKNOWN_CATEGORY_SET', message: 'Unknown category set: Recipes' })
  })

  it('rejects malformed JSON', async () => {
    const res = await post('/api/analyze', '{"text": ')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' })
  })
})
