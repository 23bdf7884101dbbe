import { errorMessage } from './issues'

// Index and constraint entries of a CREATE TABLE body, as mysqldump writes them.
const RESERVED_PREFIXES = ['PRIMARY KEY', 'KEY', 'CONSTRAINT', 'UNIQUE']
const RESERVED_WORDS = new Set(['PRIMARY', 'KEY', 'CONSTRAINT', 'UNIQUE'])

/**
 * Body of `CREATE TABLE \`name\` ( ... ) ENGINE=`, without the outer parentheses.
 * Returns null when the table has no such block.
 */
export function findCreateTableBody(dump: string, tableName: string): string | null {
  const marker = `CREATE TABLE \`${tableName}\` (`
  const start = dump.indexOf(marker)
  if (start < 0) return null
  const bodyStart = start + marker.length
  const end = dump.indexOf(') ENGINE=', bodyStart)
  if (end < 0) return null
  return dump.slice(bodyStart, end)
}

/** Every CREATE TABLE name in source order, first occurrence only. */
export function listTableNames(dump: string): string[] {
  const names: string[] = []
  const seen = new Set<string>()
  for (const match of dump.matchAll(/CREATE TABLE `([^`]+)`/g)) {
    const name = match[1]
    if (seen.has(name)) continue
    seen.add(name)
    names.push(name)
  }
  return names
}

/**
 * Split a definition list on commas that sit outside quotes, backticks and parentheses,
 * so `decimal(10,2)`, `enum('a','b')` and `DEFAULT 'x,y'` stay whole. Entries are trimmed,
 * empty ones dropped.
 */
export function splitDefinitions(body: string): string[] {
  const entries: string[] = []
  let depth = 0
  let quote: string | null = null
  let entryStart = 0

  for (let i = 0; i < body.length; i++) {
    const ch = body[i]
    if (quote) {
      if (ch === '\\' && quote === "'") i++
      else if (ch === quote) quote = null
      continue
    }
    if (ch === "'" || ch === '`' || ch === '"') quote = ch
    else if (ch === '(') depth++
    else if (ch === ')') depth = Math.max(0, depth - 1)
    else if (ch === ',' && depth === 0) {
      entries.push(body.slice(entryStart, i))
      entryStart = i + 1
    }
  }
  entries.push(body.slice(entryStart))

  return entries.map((e) => e.trim()).filter((e) => e.length > 0)
}

/** Leading identifier of a definition entry, with backticks removed. */
export function leadingIdentifier(entry: string): string {
  const quoted = /^`([^`]*)`/.exec(entry)
  if (quoted) return quoted[1]
  const token = entry.split(/\s+/)[0] ?? ''
  return token.replace(/^`+|`+$/g, '')
}

export function isKeyDefinition(entry: string): boolean {
  return RESERVED_PREFIXES.some((prefix) => entry.startsWith(prefix))
}

/**
 * Declared column names of a table, in declaration order, duplicates kept.
 * An empty result means the schema is unavailable, not that the table has no columns.
 */
export function extractTableSchema(dump: string, tableName: string): string[] {
  try {
    const body = findCreateTableBody(dump, tableName)
    if (body === null) return []

    const columns: string[] = []
    for (const entry of splitDefinitions(body)) {
      if (isKeyDefinition(entry)) continue
      const name = leadingIdentifier(entry)
      if (name && !RESERVED_WORDS.has(name)) columns.push(name)
    }
    return columns
  } catch (err) {
    console.warn(`[Schema] Error extracting schema for ${tableName}: ${errorMessage(err)}`)
    return []
  }
}
