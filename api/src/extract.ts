import { Router } from 'express'
import { DEFAULT_KEY_TABLES, extractDump, type KeyTables } from '../../src/lib/extractDump.js'
import { analyzeDump, buildSchemaReport, identifyKeyEntities } from '../../src/lib/analyzeDump.js'
import { errorMessage } from '../../src/lib/issues.js'

export type ExtractRequest = { dump: string; tables: KeyTables }

export type RequestCheck<T> = { ok: true; value: T } | { ok: false; error: string }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseExtractRequest(body: unknown): RequestCheck<ExtractRequest> {
  if (!isRecord(body) || typeof body.dump !== 'string') {
    return { ok: false, error: 'Missing required field: dump' }
  }
  if (body.tables === undefined) {
    return { ok: true, value: { dump: body.dump, tables: { ...DEFAULT_KEY_TABLES } } }
  }
  if (!isRecord(body.tables)) {
    return { ok: false, error: 'tables must be an object of table name → business name' }
  }
  const tables: KeyTables = {}
  for (const [table, business] of Object.entries(body.tables)) {
    if (typeof business !== 'string' || !business) {
      return { ok: false, error: `Invalid business name for table ${table}` }
    }
    tables[table] = business
  }
  if (!Object.keys(tables).length) return { ok: false, error: 'tables must not be empty' }
  return { ok: true, value: { dump: body.dump, tables } }
}

export function analyzeRequestDump(dump: string, now = new Date()) {
  const analysis = analyzeDump(dump)
  const report = buildSchemaReport(analysis, now)
  return {
    report,
    keyEntities: identifyKeyEntities(Object.keys(report.tables)),
    relationships: analysis.relationships,
  }
}

export const extractRouter = Router()

extractRouter.post('/extract', (req, res) => {
  console.log('[API] ← POST /extract received')
  const parsed = parseExtractRequest(req.body)
  if (!parsed.ok) {
    console.log(`[API] → 400 ${parsed.error}`)
    res.status(400).json({ error: parsed.error })
    return
  }
  try {
    const { dump, tables } = parsed.value
    console.log('[API] Dump length:', dump.length, 'chars | Tables:', Object.keys(tables).length)
    const extraction = extractDump(dump, tables)
    const extracted = extraction.tables.filter((t) => t.table).length
    console.log(`[API] → ${extracted}/${extraction.tables.length} tables extracted`)
    res.json(extraction)
  } catch (err) {
    console.error('[API] Extraction error:', errorMessage(err))
    res.status(500).json({ error: errorMessage(err) })
  }
})

extractRouter.post('/analyze', (req, res) => {
  console.log('[API] ← POST /analyze received')
  const body: unknown = req.body
  if (!isRecord(body) || typeof body.dump !== 'string') {
    console.log('[API] → 400 missing dump')
    res.status(400).json({ error: 'Missing required field: dump' })
    return
  }
  try {
    res.json(analyzeRequestDump(body.dump))
  } catch (err) {
    console.error('[API] Analysis error:', errorMessage(err))
    res.status(500).json({ error: errorMessage(err) })
  }
})
