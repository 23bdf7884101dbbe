import Papa from 'papaparse'
import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import type { DumpExtraction, DumpTable, FieldValue } from './types'

export interface TableMetadata {
  rows: number
  columns: number
  columnsList: string[]
  sampleData: Record<string, FieldValue>[]
}

export interface ExtractionMetadata {
  extractionDate: string
  sourceFile: string
  tablesExtracted: Record<string, TableMetadata>
  totalTables: number
}

const SAMPLE_ROWS = 3

/** CSV with a header row; `null` fields become empty cells. */
export function tableToCsv(table: DumpTable): string {
  return Papa.unparse({ fields: table.columns, data: table.rows }, { newline: '\n' })
}

export function rowToRecord(columns: string[], row: FieldValue[]): Record<string, FieldValue> {
  const record: Record<string, FieldValue> = {}
  columns.forEach((col, i) => {
    record[col] = row[i] ?? null
  })
  return record
}

export function buildExtractionMetadata(extraction: DumpExtraction, sourceFile: string, now = new Date()): ExtractionMetadata {
  const tablesExtracted: Record<string, TableMetadata> = {}
  for (const t of extraction.tables) {
    if (!t.table) continue
    const { columns, rows } = t.table
    tablesExtracted[t.businessName] = {
      rows: rows.length,
      columns: columns.length,
      columnsList: columns,
      sampleData: rows.slice(0, SAMPLE_ROWS).map((row) => rowToRecord(columns, row)),
    }
  }
  return {
    extractionDate: now.toISOString(),
    sourceFile,
    tablesExtracted,
    totalTables: Object.keys(tablesExtracted).length,
  }
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8')
}

/**
 * Write `<business>.csv` for every extracted table, then `extraction_metadata.json` and
 * `relationships.json`. Unavailable tables get no file. Returns the paths written.
 */
export async function writeExtraction(outDir: string, extraction: DumpExtraction, sourceFile: string, now = new Date()): Promise<string[]> {
  await mkdir(outDir, { recursive: true })
  const written: string[] = []

  for (const t of extraction.tables) {
    if (!t.table) continue
    const csvPath = path.join(outDir, `${t.businessName}.csv`)
    await writeFile(csvPath, tableToCsv(t.table), 'utf-8')
    console.log(`[Output] Saved ${t.table.rows.length} rows to ${csvPath}`)
    written.push(csvPath)
  }

  const metadataPath = path.join(outDir, 'extraction_metadata.json')
  await writeJson(metadataPath, buildExtractionMetadata(extraction, sourceFile, now))
  written.push(metadataPath)

  const relationshipsPath = path.join(outDir, 'relationships.json')
  await writeJson(relationshipsPath, extraction.relationships)
  written.push(relationshipsPath)

  return written
}
