import '../../../env.js'
import { loadCrawlConfig } from '../../../config/crawl.js'
import { runCombineCommand } from './commands/combine.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runValidateCommand } from './commands/validate.js'
import { asList, asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Harvester CLI')
  console.log('')
  console.log('Commands:')
  console.log('  crawl [--sources <id,id>] [--data-dir <path>]   crawl sources, write per-source files and data.csv')
  console.log('  combine [--data-dir <path>]                     rebuild data.csv from the per-source files')
  console.log('  validate [--source <id>]                        check source manifests')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'crawl': {
      const sources = asList(flags.sources)
      const dataDir = asString(flags['data-dir'])
      const config = loadCrawlConfig({
        ...process.env,
        ...(sources.length > 0 ? { CRAWL_SOURCES: sources.join(',') } : {}),
        ...(dataDir ? { DATA_DIR: dataDir } : {}),
      })
      exitCode = await runCrawlCommand({ config })
      break
    }
    case 'combine': {
      const dataDir = asString(flags['data-dir']) || loadCrawlConfig().dataDir
      exitCode = await runCombineCommand({ dataDir })
      break
    }
    case 'validate':
      exitCode = await runValidateCommand({ sourceId: asString(flags.source) || undefined })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
