import { DEFAULT_KEY_TABLES, type KeyTables } from './extractDump'
import { DEFAULT_PROFILE_TABLES } from './profileTables'

export type Command = 'extract' | 'analyze' | 'profile'

export interface ExtractorConfig {
  command: Command
  input: string
  outDir: string
  keyTables: KeyTables
  /** Tables `profile` reads: the `--tables` list when given, else the default profile list. */
  profileTables: string[]
  /** Use every CREATE TABLE of the dump instead of the key tables. */
  allTables: boolean
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const COMMANDS: Command[] = ['extract', 'analyze', 'profile']
const VALUE_FLAGS = ['--input', '--out', '--tables']

export const DEFAULT_INPUT = 'database.dump'
export const DEFAULT_OUT_DIR = 'extracted_data'

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value)
}

/** Parse `users:members,plans` into `{ users: 'members', plans: 'plans' }`. */
export function parseKeyTables(mapping: string): KeyTables {
  const tables: KeyTables = {}
  for (const part of mapping.split(',')) {
    const trimmed = part.trim()
    if (!trimmed) continue
    const [table, business] = trimmed.split(':').map((s) => s.trim())
    if (!table) throw new ConfigError(`Invalid table mapping: "${trimmed}"`)
    tables[table] = business || table
  }
  if (!Object.keys(tables).length) throw new ConfigError('Table list is empty')
  return tables
}

function flagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag)
  if (idx < 0) return undefined
  const value = argv[idx + 1]
  if (value === undefined || value.startsWith('--')) throw new ConfigError(`Missing value for ${flag}`)
  return value
}

/**
 * CLI flags win over environment variables (`DUMP_FILE`, `OUTPUT_DIR`, `KEY_TABLES`),
 * which win over the defaults.
 */
export function resolveConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const positional = argv.filter((arg, i) => !arg.startsWith('--') && !VALUE_FLAGS.includes(argv[i - 1] ?? ''))
  const commandArg = positional[0] ?? 'extract'
  if (!isCommand(commandArg)) {
    throw new ConfigError(`Unknown command "${commandArg}" (expected ${COMMANDS.join(', ')})`)
  }
  for (const arg of argv) {
    if (arg.startsWith('--') && !VALUE_FLAGS.includes(arg) && arg !== '--all') {
      throw new ConfigError(`Unknown option ${arg}`)
    }
  }

  const tablesArg = flagValue(argv, '--tables') ?? env.KEY_TABLES
  const keyTables = tablesArg ? parseKeyTables(tablesArg) : { ...DEFAULT_KEY_TABLES }
  return {
    command: commandArg,
    input: flagValue(argv, '--input') ?? env.DUMP_FILE ?? DEFAULT_INPUT,
    outDir: flagValue(argv, '--out') ?? env.OUTPUT_DIR ?? DEFAULT_OUT_DIR,
    keyTables,
    profileTables: tablesArg ? Object.keys(keyTables) : [...DEFAULT_PROFILE_TABLES],
    allTables: argv.includes('--all'),
  }
}
