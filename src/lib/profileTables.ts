import type { RawRow } from './types'
import { extractRows } from './extractRows'

export interface TableProfile {
  rowCount: number
  exampleRows: RawRow[]
}

const EXAMPLE_ROWS = 3

/** Tables profiled when none are named: the key tables plus the member-group join table. */
export const DEFAULT_PROFILE_TABLES = [
  'users',
  'group_user',
  'instructors',
  'subscriptions',
  'scheduled_sessions',
  'packages',
  'plans',
]

/** Row count and the first few raw rows of each table, straight from its INSERT statements. */
export function profileTables(dump: string, tableNames: string[]): Record<string, TableProfile> {
  const profile: Record<string, TableProfile> = {}
  for (const name of tableNames) {
    const { rows } = extractRows(dump, name)
    profile[name] = { rowCount: rows.length, exampleRows: rows.slice(0, EXAMPLE_ROWS) }
    console.log(`[Profile] ${name}: ${rows.length} rows`)
  }
  return profile
}
