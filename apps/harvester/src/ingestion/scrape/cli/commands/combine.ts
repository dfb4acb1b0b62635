import { combineFromDirectory } from '../../../../combine/files.js'
import { loggers } from '../../../../config/logger.js'
import { getSourceRegistry } from '../../registry.js'

interface CombineCommandArgs {
  dataDir: string
}

export async function runCombineCommand(args: CombineCommandArgs): Promise<number> {
  const result = await combineFromDirectory(args.dataDir, getSourceRegistry().manifests(), loggers.combine)
  for (const { source, rows } of result.perSource) {
    console.log(`  ${source.padEnd(18)} ${String(rows).padStart(5)} rows`)
  }
  for (const source of result.missing) {
    console.log(`  ${source.padEnd(18)} [skip] file not found`)
  }
  console.log(`Combined ${result.rows} rows -> ${result.path}`)
  return 0
}
