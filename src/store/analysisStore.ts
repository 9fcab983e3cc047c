import fsp from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { documentJsonSchema, DocumentJson } from '../analysis/serialize'
import { errorMessage } from '../errors'
import { writeJsonAtomic } from '../interfaces/atomicWrite'
import { debug, warn } from '../logger'

export const savedAnalysisSchema = z.object({
  id: z.number().int().positive(),
  documentType: z.string(),
  createdAt: z.string(),
  result: documentJsonSchema
})

export type SavedAnalysis = z.infer<typeof savedAnalysisSchema>

export interface SavedAnalysisSummary {
  id: number
  documentType: string
  createdAt: string
  overallRiskScore: number
}

/** Past analyses, kept as opaque wire-format records. */
export interface AnalysisStore {
  save(documentType: string, result: DocumentJson): Promise<SavedAnalysis>
  /** Newest first. */
  list(): Promise<SavedAnalysisSummary[]>
  get(id: number): Promise<SavedAnalysis | undefined>
}

const RECORD_FILE = /^(\d+)\.json$/

/** One `<id>.json` file per analysis under `dir`. */
export class FileAnalysisStore implements AnalysisStore {
  // last id handed out; chained so concurrent saves never share an id
  private lastId: Promise<number> | undefined

  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private async recordIds(): Promise<number[]> {
    let files: string[]
    try {
      files = await fsp.readdir(this.dir)
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
      throw err
    }
    return files
      .map((f) => RECORD_FILE.exec(f))
      .filter((m): m is RegExpExecArray => m !== null)
      .map((m) => Number(m[1]))
  }

  private async readRecord(id: number): Promise<SavedAnalysis | undefined> {
    const file = path.join(this.dir, `${id}.json`)
    let text: string
    try {
      text = await fsp.readFile(file, 'utf8')
    } catch (err) {
      debug('analysis record not readable', file, err)
      return undefined
    }
    try {
      const parsed = savedAnalysisSchema.safeParse(JSON.parse(text))
      if (parsed.success) return parsed.data
      warn(`Skipping malformed analysis record ${file}`)
    } catch (err) {
      warn(`Skipping unparsable analysis record ${file}: ${errorMessage(err)}`)
    }
    return undefined
  }

  private reserveId(): Promise<number> {
    const previous = this.lastId ?? this.recordIds().then((ids) => (ids.length > 0 ? Math.max(...ids) : 0))
    const reserved = previous.then((last) => last + 1)
    this.lastId = reserved
    // a failed directory scan is retried by the next save
    reserved.catch(() => {
      if (this.lastId === reserved) this.lastId = undefined
    })
    return reserved
  }

  async save(documentType: string, result: DocumentJson): Promise<SavedAnalysis> {
    const id = await this.reserveId()
    const record: SavedAnalysis = {
      id,
      documentType,
      createdAt: this.now().toISOString(),
      result
    }
    await writeJsonAtomic(path.join(this.dir, `${record.id}.json`), record)
    return record
  }

  async list(): Promise<SavedAnalysisSummary[]> {
    const ids = (await this.recordIds()).sort((a, b) => b - a)
    const out: SavedAnalysisSummary[] = []
    for (const id of ids) {
      const record = await this.readRecord(id)
      if (!record) continue
      out.push({
        id: record.id,
        documentType: record.documentType,
        createdAt: record.createdAt,
        overallRiskScore: record.result.overall_risk_score
      })
    }
    return out
  }

  async get(id: number): Promise<SavedAnalysis | undefined> {
    if (!Number.isInteger(id) || id <= 0) return undefined
    return this.readRecord(id)
  }
}
