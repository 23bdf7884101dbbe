import type { DumpExtraction, ExtractionIssue, ExtractionStatus, TableExtraction } from './types'
import { makeIssue } from './issues'
import { extractTableSchema } from './extractTableSchema'
import { extractRows } from './extractRows'
import { extractRelationships } from './extractRelationships'
import { reconcileTable } from './reconcile'

/** Dump table name → business name the table is reported and written under. */
export type KeyTables = Record<string, string>

export const DEFAULT_KEY_TABLES: KeyTables = {
  users: 'members',
  instructors: 'coaches',
  subscriptions: 'subscriptions',
  scheduled_sessions: 'sessions',
  plans: 'plans',
  packages: 'packages',
}

export function extractTable(dump: string, tableName: string, businessName = tableName): TableExtraction {
  console.log(`[Extract] ${businessName} ← ${tableName}`)
  const issues: ExtractionIssue[] = []
  const schemaColumns = extractTableSchema(dump, tableName)
  const unavailable = (status: TableExtraction['status']): TableExtraction => ({
    tableName,
    businessName,
    status,
    table: null,
    schemaColumns,
    rowCount: 0,
    mismatch: null,
    issues,
  })

  if (!schemaColumns.length) {
    console.log(`[Extract] Could not extract schema for ${tableName}`)
    issues.push(makeIssue('MissingSchema', tableName, `No CREATE TABLE block found for ${tableName}`))
    return unavailable('missing-schema')
  }
  console.log(`[Extract]   Schema columns (${schemaColumns.length}): ${schemaColumns.join(', ')}`)

  const { rows, issues: rowIssues } = extractRows(dump, tableName)
  issues.push(...rowIssues)
  if (!rows.length) {
    console.log(`[Extract] No data found for ${tableName}`)
    issues.push(makeIssue('NoRowsFound', tableName, `No INSERT rows found for ${tableName}`))
    return unavailable('no-rows')
  }
  console.log(`[Extract]   Rows found: ${rows.length}`)

  const { table, mismatch, overflow } = reconcileTable(tableName, schemaColumns, rows)
  if (overflow) {
    const message = `Row ${overflow.rowIndex + 1} of ${tableName} has ${overflow.length} fields, more than the ${overflow.width} columns of the first row`
    console.log(`[Extract] ${message}; table not extracted`)
    issues.push(makeIssue('RowTooLong', tableName, message))
    return unavailable('row-too-long')
  }
  if (mismatch) {
    console.log(`[Extract]   Column mismatch: expected ${mismatch.expected}, actual ${mismatch.actual}; adjusting`)
    issues.push(
      makeIssue(
        'ColumnCountMismatch',
        tableName,
        `First row of ${tableName} has ${mismatch.actual} fields for ${mismatch.expected} declared columns`,
      ),
    )
  }

  return {
    tableName,
    businessName,
    status: 'extracted',
    table,
    schemaColumns,
    rowCount: rows.length,
    mismatch,
    issues,
  }
}

/**
 * Extract every key table plus the dump-wide foreign-key links. Each table is independent:
 * a failure in one is reported on its own entry and never affects the others.
 */
export function extractDump(dump: string, keyTables: KeyTables = DEFAULT_KEY_TABLES): DumpExtraction {
  const tables = Object.entries(keyTables).map(([tableName, businessName]) => extractTable(dump, tableName, businessName))
  const relationships = extractRelationships(dump)
  return { tables, relationships }
}

const UNAVAILABLE_REASONS: Record<ExtractionStatus, string> = {
  extracted: '',
  'missing-schema': 'schema not found',
  'no-rows': 'no rows found',
  'row-too-long': 'a row has more fields than the table has columns',
}

export function formatExtractionSummary(extraction: DumpExtraction): string {
  const lines: string[] = ['='.repeat(60), 'DATA EXTRACTION SUMMARY', '='.repeat(60)]
  let totalRows = 0

  for (const t of extraction.tables) {
    lines.push('', `${t.businessName.toUpperCase()} (${t.tableName}):`)
    if (t.table) {
      totalRows += t.table.rows.length
      lines.push(`   Rows: ${t.table.rows.length}`)
      lines.push(`   Columns: ${t.table.columns.length}`)
      lines.push(`   Column names: ${t.table.columns.join(', ')}`)
      if (t.mismatch) {
        lines.push(`   Mismatch: declared ${t.mismatch.expected}, first row ${t.mismatch.actual}`)
      }
    } else {
      lines.push(`   NOT EXTRACTED: ${UNAVAILABLE_REASONS[t.status]}`)
    }
    for (const issue of t.issues) {
      if (issue.kind === 'MalformedTuple' || issue.kind === 'RowTooLong') lines.push(`   ${issue.message}`)
    }
  }

  const extracted = extraction.tables.filter((t) => t.table).length
  lines.push('', `Tables extracted: ${extracted}/${extraction.tables.length}`)
  lines.push(`Total rows extracted: ${totalRows}`)
  lines.push(`Foreign keys found: ${extraction.relationships.length}`)
  return lines.join('\n')
}
