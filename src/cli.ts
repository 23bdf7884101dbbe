import dotenv from 'dotenv'
import { ConfigError, resolveConfig, type ExtractorConfig } from './lib/config'
import { DumpNotFoundError, DumpReadError, errorMessage } from './lib/issues'
import { runCommand } from './lib/runCommand'

dotenv.config()

const USAGE = `Usage: dump-extractor [extract|analyze|profile] [--input <dump>] [--out <dir>] [--tables table:name,...] [--all]`

async function main(): Promise<number> {
  let config: ExtractorConfig
  try {
    config = resolveConfig(process.argv.slice(2))
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[CLI] ${err.message}`)
      console.error(USAGE)
      return 2
    }
    throw err
  }

  console.log(`[CLI] ${config.command}: ${config.input} → ${config.outDir}/`)
  try {
    const { written, summary } = await runCommand(config)
    console.log('')
    console.log(summary)
    console.log('')
    console.log('[CLI] Files written:')
    for (const file of written) console.log(`   ${file}`)
    return 0
  } catch (err) {
    if (err instanceof DumpNotFoundError) {
      console.error(`[CLI] Dump file not found. Expected it at: ${err.path}`)
      console.error('[CLI] Pass --input <path> or set DUMP_FILE.')
      return 1
    }
    if (err instanceof DumpReadError) {
      console.error(`[CLI] ${err.message}`)
      return 1
    }
    throw err
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('[CLI] Unexpected failure:', errorMessage(err))
    process.exitCode = 1
  })
