import type { ExtractionIssue, IssueKind } from './types'

export function slugify(input: string) {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

// Ids are derived from kind + table so that two passes over the same dump compare equal.
export function makeIssue(kind: IssueKind, tableName: string, message: string, detail?: string): ExtractionIssue {
  const id = `${slugify(kind)}-${slugify(tableName) || 'table'}`
  return { id, kind, tableName, message, detail }
}

export class DumpNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Dump file not found: ${path}`)
    this.name = 'DumpNotFoundError'
  }
}

export class DumpReadError extends Error {
  constructor(readonly path: string, detail: string) {
    super(`Failed reading dump file ${path}: ${detail}`)
    this.name = 'DumpReadError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
