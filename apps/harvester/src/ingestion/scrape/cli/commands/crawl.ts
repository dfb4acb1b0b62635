import type { CrawlConfig } from '../../../../config/crawl.js'
import { runCrawl } from '../../../../pipeline/run-crawl.js'
import type { CrawlReport } from '../../../../pipeline/run-crawl.js'

export interface CrawlCommandArgs {
  config: CrawlConfig
}

export function formatCrawlSummary(report: CrawlReport): string[] {
  const lines = report.sources.map(source => {
    const failure = source.failure ? `  ${source.failure.kind}: ${source.failure.message}` : ''
    return `  ${source.source.padEnd(18)} ${source.status.padEnd(8)} ${String(source.records).padStart(5)} records  ${String(source.pages).padStart(3)} pages${failure}`
  })
  lines.push(`Combined ${report.rows} rows -> ${report.masterPath}`)
  return lines
}

export async function runCrawlCommand(args: CrawlCommandArgs): Promise<number> {
  const report = await runCrawl(args.config)
  for (const line of formatCrawlSummary(report)) {
    console.log(line)
  }
  return report.failed.length > 0 ? 1 : 0
}
