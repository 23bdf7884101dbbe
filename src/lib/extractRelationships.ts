import type { ForeignKeyLink } from './types'
import { findCreateTableBody, leadingIdentifier, listTableNames, splitDefinitions } from './extractTableSchema'

const REFERENCES_RE = /REFERENCES\s+`([^`]+)`\s*\(([^)]*)\)/i
// optional index name: FOREIGN KEY `fk_x` (`col`)
const FOREIGN_KEY_RE = /FOREIGN\s+KEY\s*(?:`[^`]*`\s*)?\(([^)]*)\)/i
const ALTER_TABLE_RE = /ALTER TABLE `([^`]+)`([\s\S]*?);/g

export function backtickedNames(list: string): string[] {
  return Array.from(list.matchAll(/`([^`]+)`/g), (m) => m[1])
}

/**
 * Foreign-key links declared by one definition entry of `tableName`, either standalone
 * (`[CONSTRAINT ...] FOREIGN KEY (...) REFERENCES ...`) or inline on a column definition.
 * Composite keys pair local and target columns by position.
 */
export function linksFromDefinition(tableName: string, definition: string): ForeignKeyLink[] {
  const ref = REFERENCES_RE.exec(definition)
  if (!ref) return []
  const targetTable = ref[1]
  const targetColumns = backtickedNames(ref[2])
  if (!targetColumns.length) return []

  const fk = FOREIGN_KEY_RE.exec(definition)
  if (fk) {
    const localColumns = backtickedNames(fk[1])
    const count = Math.min(localColumns.length, targetColumns.length)
    const links: ForeignKeyLink[] = []
    for (let i = 0; i < count; i++) {
      links.push({ sourceTable: tableName, sourceColumn: localColumns[i], targetTable, targetColumn: targetColumns[i] })
    }
    return links
  }

  if (definition.startsWith('`')) {
    return [{ sourceTable: tableName, sourceColumn: leadingIdentifier(definition), targetTable, targetColumn: targetColumns[0] }]
  }
  return []
}

/**
 * All foreign-key links of the dump: those inside CREATE TABLE bodies (table order), then
 * those added by ALTER TABLE statements (statement order). Duplicates are dropped.
 */
export function extractRelationships(dump: string): ForeignKeyLink[] {
  const links: ForeignKeyLink[] = []
  const seen = new Set<string>()
  const add = (candidates: ForeignKeyLink[]) => {
    for (const link of candidates) {
      const key = `${link.sourceTable}:${link.sourceColumn}__${link.targetTable}:${link.targetColumn}`
      if (seen.has(key)) continue
      seen.add(key)
      links.push(link)
    }
  }

  for (const tableName of listTableNames(dump)) {
    const body = findCreateTableBody(dump, tableName)
    if (body === null) continue
    for (const entry of splitDefinitions(body)) add(linksFromDefinition(tableName, entry))
  }

  for (const match of dump.matchAll(ALTER_TABLE_RE)) {
    const tableName = match[1]
    for (const entry of splitDefinitions(match[2])) add(linksFromDefinition(tableName, entry))
  }

  return links
}
