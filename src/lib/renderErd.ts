/**
 * Entity-relationship renderings of a schema report.
 *
 * Mermaid: one entity per table, attributes as `type name [PK|FK]`, and a
 * `parent ||--o{ child` edge per foreign key.
 * Text: Markdown overview, tables grouped by business area, and the key relationships.
 */
import type { SchemaReport } from './analyzeDump'

type ErdGroup = 'Members' | 'Coaches' | 'Subscriptions' | 'Sessions' | 'Plans' | 'System'

const ERD_GROUPS: ErdGroup[] = ['Members', 'Coaches', 'Subscriptions', 'Sessions', 'Plans', 'System']

function mermaidType(definition: string): string {
  const token = definition.split(/\s+/)[0] ?? ''
  const base = token.replace(/\(.*$/, '').replace(/[^A-Za-z0-9_]/g, '')
  return base || 'unknown'
}

export function erdGroupFor(tableName: string): ErdGroup {
  const lower = tableName.toLowerCase()
  if (lower.includes('user') || lower.includes('member')) return 'Members'
  if (lower.includes('instructor') || lower.includes('coach')) return 'Coaches'
  if (lower.includes('subscription')) return 'Subscriptions'
  if (lower.includes('session')) return 'Sessions'
  if (lower.includes('plan') || lower.includes('package')) return 'Plans'
  return 'System'
}

export function renderMermaidErd(report: SchemaReport): string {
  const lines = [`# ${report.databaseName} - Entity Relationship Diagram`, '', '```mermaid', 'erDiagram']

  for (const table of Object.values(report.tables)) {
    const fkColumns = new Set(table.foreignKeys.map((fk) => fk.sourceColumn))
    lines.push(`    ${table.name} {`)
    for (const col of table.columns) {
      const keys = [table.primaryKeys.includes(col.name) ? 'PK' : '', fkColumns.has(col.name) ? 'FK' : ''].filter(Boolean)
      lines.push(`        ${mermaidType(col.definition)} ${col.name}${keys.length ? ` ${keys.join(', ')}` : ''}`)
    }
    lines.push('    }')
  }

  for (const table of Object.values(report.tables)) {
    for (const fk of table.foreignKeys) {
      lines.push(`    ${fk.targetTable} ||--o{ ${fk.sourceTable} : "${fk.sourceColumn} -> ${fk.targetColumn}"`)
    }
  }

  lines.push('```', '')
  return lines.join('\n')
}

export function renderTextErd(report: SchemaReport): string {
  const lines = [
    `# ${report.databaseName} - Entity Relationship Diagram`,
    '',
    '## Database Overview',
    `- **Total Tables**: ${report.totalTables}`,
    `- **Total Columns**: ${report.summary.totalColumns}`,
    `- **Primary Keys**: ${report.summary.totalPrimaryKeys}`,
    `- **Foreign Keys**: ${report.summary.totalForeignKeys}`,
    '',
    '## Entity Relationships',
    '',
  ]

  const tables = Object.values(report.tables)
  for (const group of ERD_GROUPS) {
    const members = tables.filter((t) => erdGroupFor(t.name) === group)
    if (!members.length) continue
    lines.push(`### ${group}`)
    for (const t of members) {
      lines.push(`- **${t.name}** (${t.columns.length} columns)`)
      if (t.primaryKeys.length) lines.push(`  - Primary Keys: ${t.primaryKeys.join(', ')}`)
      if (t.foreignKeys.length) lines.push(`  - Foreign Keys: ${t.foreignKeys.length} relationships`)
    }
    lines.push('')
  }

  lines.push('## Key Relationships', '')
  for (const t of tables) {
    if (!t.foreignKeys.length) continue
    lines.push(`### ${t.name}`)
    for (const fk of t.foreignKeys) {
      lines.push(`- \`${fk.sourceColumn}\` → \`${fk.targetTable}.${fk.targetColumn}\``)
    }
    lines.push('')
  }

  return lines.join('\n')
}
