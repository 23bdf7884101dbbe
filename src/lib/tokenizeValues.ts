/**
 * Quote-aware tokenizer for the tuple list of an `INSERT ... VALUES` statement.
 *
 * A single left-to-right pass with three states:
 *
 *   outside  between tuples; `(` opens a tuple, `;` ends the statement
 *   tuple    inside `( ... )`; top-level `,` ends a field, nested parens are field text
 *   quoted   inside a single-quoted literal; `\x` and `''` are escapes, nothing else is special
 *
 * Fields are sliced from the source text, so the scan stays linear in the statement length.
 */
import type { FieldValue, RawRow } from './types'

export class MalformedTupleError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message)
    this.name = 'MalformedTupleError'
  }
}

type ScanState = 'outside' | 'tuple' | 'quoted'

const ESCAPES: Record<string, string> = {
  '0': '\0',
  b: '\b',
  n: '\n',
  r: '\r',
  t: '\t',
  Z: '\x1a',
  // LIKE wildcards keep their backslash
  '%': '\\%',
  _: '\\_',
}

export function unescapeSqlString(text: string): string {
  return text.replace(/\\([\s\S])|''/g, (_match, ch: string | undefined) => {
    if (ch === undefined) return "'"
    return ESCAPES[ch] ?? ch
  })
}

/**
 * Clean one raw field: trim, drop one layer of single quotes (decoding escapes), and map
 * unquoted `NULL` or any empty value to `null`. A quoted `'NULL'` stays text.
 */
export function cleanField(raw: string): FieldValue {
  const trimmed = raw.trim()
  if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
    const value = unescapeSqlString(trimmed.slice(1, -1))
    return value === '' ? null : value
  }
  if (trimmed === '' || trimmed === 'NULL') return null
  return trimmed
}

/**
 * Scan the tuple list beginning at `start` (just past `VALUES`), handing every completed
 * tuple to `onRow` as soon as it closes. Returns the offset just past the terminating `;`,
 * or the text length when the statement runs to the end of input between tuples.
 *
 * Throws MalformedTupleError when the text ends inside a tuple or a quoted string; rows
 * already handed to `onRow` stay valid.
 */
export function scanValues(text: string, start: number, onRow: (row: RawRow) => void): number {
  let state: ScanState = 'outside'
  let depth = 0
  let fieldStart = start
  let tupleStart = start
  let fields: string[] = []

  for (let i = start; i < text.length; i++) {
    const ch = text[i]

    if (state === 'quoted') {
      if (ch === '\\') {
        i++
      } else if (ch === "'") {
        if (text[i + 1] === "'") i++
        else state = 'tuple'
      }
      continue
    }

    if (state === 'outside') {
      if (ch === ';') return i + 1
      if (ch === '(') {
        state = 'tuple'
        depth = 1
        fields = []
        fieldStart = i + 1
        tupleStart = i
      }
      continue
    }

    // inside a tuple
    if (ch === "'") {
      state = 'quoted'
    } else if (ch === '(') {
      depth++
    } else if (ch === ')') {
      depth--
      if (depth === 0) {
        const last = text.slice(fieldStart, i)
        if (fields.length > 0 || last.trim() !== '') fields.push(last)
        onRow(fields.map(cleanField))
        state = 'outside'
      }
    } else if (ch === ',' && depth === 1) {
      fields.push(text.slice(fieldStart, i))
      fieldStart = i + 1
    }
  }

  if (state === 'quoted') {
    throw new MalformedTupleError(`Unterminated quoted string in tuple at offset ${tupleStart}`, tupleStart)
  }
  if (state === 'tuple') {
    throw new MalformedTupleError(`Unclosed tuple at offset ${tupleStart}`, tupleStart)
  }
  return text.length
}
