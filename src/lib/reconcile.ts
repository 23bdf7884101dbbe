import type { ColumnMismatch, DumpTable, FieldValue, RawRow } from './types'

/** A row after the first that has more fields than the table has columns. */
export interface RowOverflow {
  /** 0-based position among the table's rows. */
  rowIndex: number
  length: number
  width: number
}

export interface ReconcileResult {
  /** null when the table is unavailable: no schema, no rows, or a row overflowing the columns. */
  table: DumpTable | null
  mismatch: ColumnMismatch | null
  overflow: RowOverflow | null
}

function padRow(row: RawRow, width: number): RawRow {
  if (row.length >= width) return row
  return [...row, ...new Array<FieldValue>(width - row.length).fill(null)]
}

/**
 * Align a table's declared columns with the field count of its first row.
 *
 * Extra fields get placeholder names `column_<n>` (1-based); missing fields drop the
 * trailing declared columns. Later rows shorter than that width are padded with `null`.
 * A later row longer than the width makes the whole table unavailable.
 */
export function reconcileTable(name: string, columns: string[], rows: RawRow[]): ReconcileResult {
  if (!columns.length || !rows.length) return { table: null, mismatch: null, overflow: null }

  const actual = rows[0].length
  const expected = columns.length
  const mismatch = actual === expected ? null : { expected, actual }
  let adjusted = [...columns]

  if (actual > expected) {
    for (let i = expected; i < actual; i++) adjusted.push(`column_${i + 1}`)
  } else if (actual < expected) {
    adjusted = adjusted.slice(0, actual)
  }

  const overflowAt = rows.findIndex((row) => row.length > actual)
  if (overflowAt >= 0) {
    return { table: null, mismatch, overflow: { rowIndex: overflowAt, length: rows[overflowAt].length, width: actual } }
  }

  return {
    table: { name, columns: adjusted, rows: rows.map((row) => padRow(row, actual)) },
    mismatch,
    overflow: null,
  }
}
