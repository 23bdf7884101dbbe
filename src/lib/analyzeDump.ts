import type { ColumnDefinition, ForeignKeyLink, TableStructure } from './types'
import { findCreateTableBody, leadingIdentifier, listTableNames, splitDefinitions } from './extractTableSchema'
import { backtickedNames, extractRelationships, linksFromDefinition } from './extractRelationships'

export interface DumpAnalysis {
  tables: Record<string, TableStructure>
  relationships: ForeignKeyLink[]
  totalInserts: number
}

export interface SchemaReport {
  analysisDate: string
  databaseName: string
  totalTables: number
  tables: Record<string, TableStructure>
  summary: {
    totalColumns: number
    totalPrimaryKeys: number
    totalForeignKeys: number
    averageColumnsPerTable: number
  }
}

export type KeyEntity = 'members' | 'coaches' | 'subscriptions' | 'sessions' | 'plans' | 'payments' | 'equipment' | 'classes'

// Checked in order, first hit wins ("membership" lands in members).
const ENTITY_KEYWORDS: [string, KeyEntity][] = [
  ['member', 'members'],
  ['user', 'members'],
  ['client', 'members'],
  ['coach', 'coaches'],
  ['trainer', 'coaches'],
  ['instructor', 'coaches'],
  ['subscription', 'subscriptions'],
  ['membership', 'subscriptions'],
  ['plan', 'plans'],
  ['package', 'plans'],
  ['session', 'sessions'],
  ['workout', 'sessions'],
  ['class', 'classes'],
  ['course', 'classes'],
  ['payment', 'payments'],
  ['billing', 'payments'],
  ['equipment', 'equipment'],
  ['machine', 'equipment'],
]

/** Columns, primary keys and foreign keys declared inside one CREATE TABLE body. */
export function analyzeTableStructure(name: string, body: string): TableStructure {
  const columns: ColumnDefinition[] = []
  const primaryKeys: string[] = []
  const foreignKeys: ForeignKeyLink[] = []

  for (const entry of splitDefinitions(body)) {
    if (entry.startsWith('--')) continue
    if (entry.startsWith('`')) {
      const column = leadingIdentifier(entry)
      const definition = entry.slice(entry.indexOf('`', 1) + 1).trim()
      if (/PRIMARY KEY/i.test(definition)) primaryKeys.push(column)
      columns.push({ name: column, definition })
    } else if (/^PRIMARY KEY/i.test(entry)) {
      primaryKeys.push(...backtickedNames(entry))
    }
    foreignKeys.push(...linksFromDefinition(name, entry))
  }

  return { name, columns, primaryKeys, foreignKeys }
}

/**
 * Structure of every table in the dump. Foreign keys added later by ALTER TABLE are
 * attached to their owning table as well.
 */
export function analyzeDump(dump: string): DumpAnalysis {
  const tables: Record<string, TableStructure> = {}
  for (const name of listTableNames(dump)) {
    const body = findCreateTableBody(dump, name)
    if (body === null) continue
    tables[name] = analyzeTableStructure(name, body)
  }

  const relationships = extractRelationships(dump)
  for (const link of relationships) {
    const table = tables[link.sourceTable]
    if (!table) continue
    const known = table.foreignKeys.some(
      (fk) => fk.sourceColumn === link.sourceColumn && fk.targetTable === link.targetTable && fk.targetColumn === link.targetColumn,
    )
    if (!known) table.foreignKeys.push(link)
  }

  const totalInserts = Array.from(dump.matchAll(/INSERT INTO/gi)).length
  console.log(`[Analyze] ${Object.keys(tables).length} tables, ${totalInserts} INSERT statements, ${relationships.length} foreign keys`)
  return { tables, relationships, totalInserts }
}

export function buildSchemaReport(analysis: DumpAnalysis, now = new Date(), databaseName = 'Gym Management System'): SchemaReport {
  const tables = Object.values(analysis.tables)
  const totalColumns = tables.reduce((sum, t) => sum + t.columns.length, 0)
  return {
    analysisDate: now.toISOString(),
    databaseName,
    totalTables: tables.length,
    tables: analysis.tables,
    summary: {
      totalColumns,
      totalPrimaryKeys: tables.reduce((sum, t) => sum + t.primaryKeys.length, 0),
      totalForeignKeys: tables.reduce((sum, t) => sum + t.foreignKeys.length, 0),
      averageColumnsPerTable: tables.length ? Math.round((totalColumns / tables.length) * 100) / 100 : 0,
    },
  }
}

export function identifyKeyEntities(tableNames: string[]): Record<KeyEntity, string[]> {
  const entities: Record<KeyEntity, string[]> = {
    members: [],
    coaches: [],
    subscriptions: [],
    sessions: [],
    plans: [],
    payments: [],
    equipment: [],
    classes: [],
  }
  for (const name of tableNames) {
    const lower = name.toLowerCase()
    const hit = ENTITY_KEYWORDS.find(([keyword]) => lower.includes(keyword))
    if (hit) entities[hit[1]].push(name)
  }
  return entities
}
