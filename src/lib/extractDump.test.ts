import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { DEFAULT_KEY_TABLES, extractDump, extractTable, formatExtractionSummary } from './extractDump'
import { tableToCsv } from './writeOutputs'

const planDump = [
  'CREATE TABLE `plans` (`id` int, `name` varchar(50), `price` int) ENGINE=InnoDB;',
  "INSERT INTO `plans` (`id`,`name`,`price`) VALUES (1,'Basic',100),(2,'Pro, Plus',200);",
].join('\n')

const gymDump = `
CREATE TABLE \`plans\` (
  \`id\` int NOT NULL,
  \`name\` varchar(50) NOT NULL,
  \`price\` int NOT NULL,
  PRIMARY KEY (\`id\`)
) ENGINE=InnoDB;
INSERT INTO \`plans\` VALUES (1,'Basic',100),(2,'Pro, Plus',200);

CREATE TABLE \`subscriptions\` (
  \`id\` int NOT NULL,
  \`plan_id\` int NOT NULL,
  \`status\` varchar(20) DEFAULT NULL,
  PRIMARY KEY (\`id\`),
  CONSTRAINT \`fk_plan\` FOREIGN KEY (\`plan_id\`) REFERENCES \`plans\`(\`id\`)
) ENGINE=InnoDB;
INSERT INTO \`subscriptions\` VALUES (10,1,'paid','2024-02-01'),(11,2,NULL,'2024-03-01');

CREATE TABLE \`instructors\` (
  \`id\` int NOT NULL,
  \`name\` varchar(50) NOT NULL
) ENGINE=InnoDB;

INSERT INTO \`packages\` VALUES (1,'Ten sessions');
`

const unevenSchema = 'CREATE TABLE `t` (`a` int, `b` int) ENGINE=InnoDB;'

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('extractTable', () => {
  it('extracts schema and rows of a well-formed table', () => {
    const result = extractTable(planDump, 'plans')
    expect(result.status).toBe('extracted')
    expect(result.table).toEqual({
      name: 'plans',
      columns: ['id', 'name', 'price'],
      rows: [
        ['1', 'Basic', '100'],
        ['2', 'Pro, Plus', '200'],
      ],
    })
    expect(result.businessName).toBe('plans')
    expect(result.issues).toEqual([])
  })

  it('reports a table without CREATE TABLE as unavailable even with inserts', () => {
    const result = extractTable(gymDump, 'packages', 'packages')
    expect(result.status).toBe('missing-schema')
    expect(result.table).toBeNull()
    expect(result.schemaColumns).toEqual([])
    expect(result.issues.map((i) => i.kind)).toEqual(['MissingSchema'])
  })

  it('reports a table without rows as unavailable', () => {
    const result = extractTable(gymDump, 'instructors', 'coaches')
    expect(result.status).toBe('no-rows')
    expect(result.table).toBeNull()
    expect(result.schemaColumns).toEqual(['id', 'name'])
    expect(result.issues.map((i) => i.kind)).toEqual(['NoRowsFound'])
  })

  it('records a column-count mismatch and pads the schema', () => {
    const result = extractTable(gymDump, 'subscriptions')
    expect(result.table?.columns).toEqual(['id', 'plan_id', 'status', 'column_4'])
    expect(result.mismatch).toEqual({ expected: 3, actual: 4 })
    expect(result.issues.map((i) => i.kind)).toEqual(['ColumnCountMismatch'])
    expect(result.table?.rows[1]).toEqual(['11', '2', null, '2024-03-01'])
  })

  it('pads later rows shorter than the first, keeping every field in the CSV', () => {
    const result = extractTable(`${unevenSchema}\nINSERT INTO \`t\` VALUES (1,2),(6);`, 't')
    expect(result.status).toBe('extracted')
    expect(result.table?.rows).toEqual([['1', '2'], ['6', null]])
    expect(result.table && tableToCsv(result.table)).toBe('a,b\n1,2\n6,')
  })

  it('reports a table unavailable when a later row is longer than the first', () => {
    const result = extractTable(`${unevenSchema}\nINSERT INTO \`t\` VALUES (1,2),(3,4,5),(6);`, 't')
    expect(result.status).toBe('row-too-long')
    expect(result.table).toBeNull()
    expect(result.issues.map((i) => [i.kind, i.message])).toEqual([
      ['RowTooLong', 'Row 2 of t has 3 fields, more than the 2 columns of the first row'],
    ])
  })
})

describe('extractDump', () => {
  const keyTables = { plans: 'plans', subscriptions: 'subscriptions', instructors: 'coaches', packages: 'packages' }

  it('extracts key tables in order together with foreign keys', () => {
    const result = extractDump(gymDump, keyTables)
    expect(result.tables.map((t) => [t.businessName, t.status])).toEqual([
      ['plans', 'extracted'],
      ['subscriptions', 'extracted'],
      ['coaches', 'no-rows'],
      ['packages', 'missing-schema'],
    ])
    expect(result.relationships).toEqual([
      { sourceTable: 'subscriptions', sourceColumn: 'plan_id', targetTable: 'plans', targetColumn: 'id' },
    ])
  })

  it('returns identical results for the same input', () => {
    expect(extractDump(gymDump, keyTables)).toEqual(extractDump(gymDump, keyTables))
  })

  it('uses the default key tables', () => {
    const result = extractDump(gymDump)
    expect(result.tables.map((t) => t.tableName)).toEqual(Object.keys(DEFAULT_KEY_TABLES))
    expect(result.tables.find((t) => t.tableName === 'users')?.businessName).toBe('members')
  })
})

describe('formatExtractionSummary', () => {
  it('reports found and missing tables with counts', () => {
    const summary = formatExtractionSummary(
      extractDump(gymDump, { plans: 'plans', subscriptions: 'subscriptions', packages: 'packages' }),
    )
    const lines = summary.split('\n')
    expect(lines).toContain('PLANS (plans):')
    expect(lines).toContain('   Rows: 2')
    expect(lines).toContain('   Column names: id, name, price')
    expect(lines).toContain('   Mismatch: declared 3, first row 4')
    expect(lines).toContain('PACKAGES (packages):')
    expect(lines).toContain('   NOT EXTRACTED: schema not found')
    expect(lines).toContain('Tables extracted: 2/3')
    expect(lines).toContain('Total rows extracted: 4')
    expect(lines).toContain('Foreign keys found: 1')
  })

  it('explains tables dropped for an overlong row', () => {
    const lines = formatExtractionSummary(extractDump(`${unevenSchema}\nINSERT INTO \`t\` VALUES (1,2),(3,4,5);`, { t: 't' })).split('\n')
    expect(lines).toContain('   NOT EXTRACTED: a row has more fields than the table has columns')
    expect(lines).toContain('   Row 2 of t has 3 fields, more than the 2 columns of the first row')
    expect(lines).toContain('Tables extracted: 0/1')
  })
})
