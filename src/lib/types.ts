/** A single extracted field: `null` for SQL NULL (or an empty value), otherwise the literal text. */
export type FieldValue = string | null

export type RawRow = FieldValue[]

export interface DumpTable {
  name: string
  columns: string[]
  rows: RawRow[]
}

export interface ForeignKeyLink {
  sourceTable: string
  sourceColumn: string
  targetTable: string
  targetColumn: string
}

export type IssueKind = 'MissingSchema' | 'NoRowsFound' | 'ColumnCountMismatch' | 'RowTooLong' | 'MalformedTuple'

export interface ExtractionIssue {
  id: string
  kind: IssueKind
  tableName?: string
  message: string
  detail?: string
}

export interface ColumnMismatch {
  expected: number
  actual: number
}

export type ExtractionStatus = 'extracted' | 'missing-schema' | 'no-rows' | 'row-too-long'

export interface TableExtraction {
  tableName: string
  businessName: string
  status: ExtractionStatus
  table: DumpTable | null
  schemaColumns: string[]
  rowCount: number
  mismatch: ColumnMismatch | null
  issues: ExtractionIssue[]
}

export interface DumpExtraction {
  tables: TableExtraction[]
  relationships: ForeignKeyLink[]
}

export interface ColumnDefinition {
  name: string
  definition: string
}

export interface TableStructure {
  name: string
  columns: ColumnDefinition[]
  primaryKeys: string[]
  foreignKeys: ForeignKeyLink[]
}
