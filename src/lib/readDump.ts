import { readFile } from 'fs/promises'
import path from 'path'
import { gunzipSync, unzipSync } from 'fflate'
import { DumpNotFoundError, DumpReadError, errorMessage } from './issues'

const DUMP_ENTRY = /\.(sql|dump)$/i
const TAR_ARCHIVE = /\.(tar|tgz|tar\.gz)$/

/**
 * Decode dump bytes to text. `.gz` is gunzipped; `.zip` yields its first `.sql`/`.dump`
 * entry; tar archives are rejected. Invalid UTF-8 sequences are dropped.
 */
export function decodeDump(fileName: string, bytes: Uint8Array): string {
  const lower = fileName.toLowerCase()
  let data = bytes
  if (TAR_ARCHIVE.test(lower)) {
    throw new DumpReadError(fileName, 'tar archives are not supported; extract the .sql file or gzip it on its own')
  }
  if (lower.endsWith('.gz')) {
    data = gunzipSync(bytes)
  } else if (lower.endsWith('.zip')) {
    const entry = Object.entries(unzipSync(bytes)).find(([name, content]) => DUMP_ENTRY.test(name) && content.length > 0)
    if (!entry) throw new DumpReadError(fileName, 'archive has no .sql or .dump entry')
    data = entry[1]
  }
  return new TextDecoder('utf-8').decode(data).replace(/\uFFFD/g, '')
}

export async function readDumpFile(filePath: string): Promise<string> {
  const resolved = path.resolve(filePath)
  let bytes: Uint8Array
  try {
    bytes = await readFile(resolved)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') throw new DumpNotFoundError(resolved)
    throw new DumpReadError(resolved, errorMessage(err))
  }

  try {
    const text = decodeDump(resolved, bytes)
    console.log(`[Dump] Read ${text.length} characters from ${resolved}`)
    return text
  } catch (err) {
    if (err instanceof DumpReadError) throw err
    throw new DumpReadError(resolved, errorMessage(err))
  }
}
