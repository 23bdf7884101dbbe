import path from 'path'
import { mkdir, writeFile } from 'fs/promises'
import type { ExtractorConfig } from './config'
import { extractDump, formatExtractionSummary, type KeyTables } from './extractDump'
import { listTableNames } from './extractTableSchema'
import { analyzeDump, buildSchemaReport, identifyKeyEntities } from './analyzeDump'
import { profileTables } from './profileTables'
import { renderMermaidErd, renderTextErd } from './renderErd'
import { readDumpFile } from './readDump'
import { writeExtraction, writeJson } from './writeOutputs'

export interface CommandOutcome {
  written: string[]
  summary: string
}

function tablesFor(config: ExtractorConfig, dump: string): KeyTables {
  if (!config.allTables) return config.keyTables
  return Object.fromEntries(listTableNames(dump).map((name) => [name, name]))
}

export async function runExtract(config: ExtractorConfig, dump: string, now = new Date()): Promise<CommandOutcome> {
  const extraction = extractDump(dump, tablesFor(config, dump))
  const written = await writeExtraction(config.outDir, extraction, config.input, now)
  return { written, summary: formatExtractionSummary(extraction) }
}

export async function runAnalyze(config: ExtractorConfig, dump: string, now = new Date()): Promise<CommandOutcome> {
  const analysis = analyzeDump(dump)
  const report = buildSchemaReport(analysis, now)
  const keyEntities = identifyKeyEntities(Object.keys(report.tables))

  await mkdir(config.outDir, { recursive: true })
  const files: [string, string][] = [
    ['schema_report.json', JSON.stringify(report, null, 2) + '\n'],
    ['key_entities.json', JSON.stringify(keyEntities, null, 2) + '\n'],
    ['erd_mermaid.md', renderMermaidErd(report)],
    ['erd_text.md', renderTextErd(report)],
  ]
  const written: string[] = []
  for (const [name, content] of files) {
    const target = path.join(config.outDir, name)
    await writeFile(target, content, 'utf-8')
    written.push(target)
  }

  const lines = [
    'ANALYSIS SUMMARY:',
    `• Total Tables: ${report.totalTables}`,
    `• Total Columns: ${report.summary.totalColumns}`,
    `• Total Primary Keys: ${report.summary.totalPrimaryKeys}`,
    `• Total Foreign Keys: ${report.summary.totalForeignKeys}`,
    `• INSERT statements: ${analysis.totalInserts}`,
    '',
    'KEY BUSINESS ENTITIES:',
  ]
  for (const [entity, tables] of Object.entries(keyEntities)) {
    if (tables.length) lines.push(`• ${entity}: ${tables.join(', ')}`)
  }
  return { written, summary: lines.join('\n') }
}

export async function runProfile(config: ExtractorConfig, dump: string): Promise<CommandOutcome> {
  const tableNames = config.allTables ? listTableNames(dump) : config.profileTables
  const profile = profileTables(dump, tableNames)

  await mkdir(config.outDir, { recursive: true })
  const target = path.join(config.outDir, 'data_profile.json')
  await writeJson(target, profile)

  const lines = ['DATA PROFILE SUMMARY:']
  let total = 0
  for (const [name, info] of Object.entries(profile)) {
    total += info.rowCount
    lines.push(`• ${name}: ${info.rowCount} rows`)
  }
  lines.push(`Total rows across all tables: ${total}`)
  return { written: [target], summary: lines.join('\n') }
}

/** Read the configured dump and run the configured command over it. */
export async function runCommand(config: ExtractorConfig, now = new Date()): Promise<CommandOutcome> {
  const dump = await readDumpFile(config.input)
  switch (config.command) {
    case 'extract':
      return runExtract(config, dump, now)
    case 'analyze':
      return runAnalyze(config, dump, now)
    case 'profile':
      return runProfile(config, dump)
  }
}
