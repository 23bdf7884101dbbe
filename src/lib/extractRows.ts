import type { ExtractionIssue, RawRow } from './types'
import { errorMessage, makeIssue } from './issues'
import { scanValues } from './tokenizeValues'

export interface RowExtraction {
  rows: RawRow[]
  issues: ExtractionIssue[]
}

/**
 * Collect the rows of every `INSERT INTO \`table\` ... VALUES (...),(...);` statement, in
 * source order. Field counts are not checked against any schema here.
 *
 * A malformed statement stops extraction for this table only: rows completed before it
 * are returned alongside a MalformedTuple issue.
 */
export function extractRows(dump: string, tableName: string): RowExtraction {
  const rows: RawRow[] = []
  const issues: ExtractionIssue[] = []
  const header = `INSERT INTO \`${tableName}\``
  let cursor = 0

  try {
    for (;;) {
      const at = dump.indexOf(header, cursor)
      if (at < 0) break
      const afterHeader = at + header.length
      const valuesAt = dump.indexOf('VALUES', afterHeader)
      if (valuesAt < 0) break

      // `INSERT ... SET` and friends end before any VALUES keyword
      const semicolon = dump.indexOf(';', afterHeader)
      if (semicolon >= 0 && semicolon < valuesAt) {
        cursor = semicolon + 1
        continue
      }

      cursor = scanValues(dump, valuesAt + 'VALUES'.length, (row) => rows.push(row))
    }
  } catch (err) {
    const detail = errorMessage(err)
    console.warn(`[Rows] Error parsing table ${tableName}: ${detail}`)
    issues.push(
      makeIssue(
        'MalformedTuple',
        tableName,
        `Malformed tuple in ${tableName}; kept ${rows.length} rows parsed before the failure`,
        detail,
      ),
    )
  }

  return { rows, issues }
}
