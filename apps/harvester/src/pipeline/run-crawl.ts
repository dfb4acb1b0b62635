import { randomUUID } from 'node:crypto'
import type { ILogger } from '@pricegrid/logger'
import { writeMasterFile, writeSourceFile } from '../combine/files.js'
import { combineSources } from '../combine/unify.js'
import type { CrawlConfig } from '../config/crawl.js'
import { loggers } from '../config/logger.js'
import { getSourceRegistry } from '../ingestion/scrape/registry.js'
import type { SourceRegistry } from '../ingestion/scrape/registry.js'
import type { SourceId } from '../ingestion/scrape/types.js'
import type { Sleep } from '../scraper/fetch/rate-limiter.js'
import { createRunContext } from './context.js'
import type { TransportFactory } from './context.js'
import { runSource } from './run-source.js'
import type { SourceReport, SourceResult } from './run-source.js'

export interface CrawlReport {
  runId: string
  startedAt: string
  finishedAt: string
  sources: SourceReport[]
  /** Path of the master dataset */
  masterPath: string
  /** Rows in the master dataset */
  rows: number
  failed: SourceId[]
}

export interface RunCrawlOptions {
  registry?: SourceRegistry
  transports?: TransportFactory
  sleep?: Sleep
  log?: ILogger
  now?: () => Date
}

/**
 * Crawl the configured sources in parallel, write each source's file, then
 * rebuild the master dataset from this run's results.
 *
 * A failed source leaves its previous file in place and contributes no rows
 * to the master dataset.
 */
export async function runCrawl(config: CrawlConfig, options: RunCrawlOptions = {}): Promise<CrawlReport> {
  const registry = options.registry ?? getSourceRegistry()
  const log = options.log ?? loggers.crawl
  const now = options.now ?? (() => new Date())
  const runId = randomUUID()
  const startedAt = now().toISOString()

  const manifests = config.sources.flatMap(id => {
    const manifest = registry.get(id)
    if (!manifest) {
      log.warn('Source not registered, skipped', { source: id })
      return []
    }
    return [manifest]
  })

  log.info('Crawl started', { runId, sources: manifests.map(manifest => manifest.id) })

  const results: SourceResult[] = await Promise.all(
    manifests.map(manifest =>
      runSource(
        createRunContext(manifest, config, {
          runId,
          transports: options.transports,
          sleep: options.sleep,
          log,
        })
      )
    )
  )

  const succeeded = manifests.flatMap((manifest, index) => {
    const result = results[index]
    return result && result.report.status !== 'failed' ? [{ manifest, records: result.records }] : []
  })

  for (const { manifest, records } of succeeded) {
    await writeSourceFile(config.dataDir, manifest, records)
  }

  const combined = combineSources(succeeded, log)
  const masterPath = await writeMasterFile(config.dataDir, combined)

  const reports = results.map(result => result.report)
  const failed = reports.filter(report => report.status === 'failed').map(report => report.source)

  log.info('Crawl finished', { runId, rows: combined.length, masterPath, failed })

  return {
    runId,
    startedAt,
    finishedAt: now().toISOString(),
    sources: reports,
    masterPath,
    rows: combined.length,
    failed,
  }
}
