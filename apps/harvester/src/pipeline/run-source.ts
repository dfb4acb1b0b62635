import { extractRecords } from '../ingestion/scrape/kit/extract.js'
import type { RawRecord, SourceId } from '../ingestion/scrape/types.js'
import { classifyCrawlError } from '../scraper/errors.js'
import type { ClassifiedCrawlError } from '../scraper/errors.js'
import type { GovernorStats } from '../scraper/fetch/governor.js'
import { dedupeRecords } from '../scraper/process/run-dedupe.js'
import type { RunContext } from './context.js'

export type SourceRunStatus = 'ok' | 'partial' | 'failed'

export interface SourceReport {
  source: SourceId
  label: string
  runId: string
  status: SourceRunStatus
  /** Records after deduplication */
  records: number
  pages: number
  /** Records extracted before deduplication */
  extracted: number
  duplicates: number
  /** Listings without identity */
  skipped: number
  /** Listings dropped by the source's exclusion rule */
  excluded: number
  /** Records obtained before a fatal failure; those records are discarded */
  partialRecordCount?: number
  failure?: ClassifiedCrawlError
  fetch: GovernorStats
  durationMs: number
}

export interface SourceResult {
  report: SourceReport
  /** Deduplicated native records in page order of first appearance */
  records: RawRecord[]
}

/**
 * Drive one source's pagination, extract every page and deduplicate.
 *
 * Never throws: a transport failure that outlives the fallback keeps the
 * pages already fetched (partial); schema drift or an unexpected error
 * discards the source's records (failed).
 */
export async function runSource(context: RunContext): Promise<SourceResult> {
  const { manifest, log, governor, strategy } = context
  const startTime = Date.now()
  const extracted: RawRecord[] = []
  let pages = 0
  let skipped = 0
  let excluded = 0
  let failure: ClassifiedCrawlError | undefined

  log.info('Source run started', { strategy: strategy.name })

  try {
    for await (const page of strategy.drive(governor)) {
      const result = extractRecords(page, manifest.records, {
        source: manifest.id,
        identity: manifest.identity,
        log,
      })
      pages++
      skipped += result.skipped
      excluded += result.excluded
      extracted.push(...result.records)
      log.debug('Page extracted', { page: page.index, records: result.records.length })
    }
  } catch (error) {
    failure = classifyCrawlError(error)
    log.error('Source run failed', { kind: failure.kind, pages, extracted: extracted.length }, error)
  }

  let status: SourceRunStatus = 'ok'
  let records: RawRecord[] = []
  let duplicates = 0
  let partialRecordCount: number | undefined

  if (failure && (failure.kind !== 'SourceUnavailable' || pages === 0)) {
    status = 'failed'
    partialRecordCount = extracted.length
  } else {
    const deduped = dedupeRecords(extracted, manifest.identity)
    records = deduped.records
    duplicates = deduped.duplicates
    if (failure) {
      status = 'partial'
      partialRecordCount = records.length
    }
  }

  const report: SourceReport = {
    source: manifest.id,
    label: manifest.label,
    runId: context.runId,
    status,
    records: records.length,
    pages,
    extracted: extracted.length,
    duplicates,
    skipped,
    excluded,
    partialRecordCount,
    failure,
    fetch: governor.stats,
    durationMs: Date.now() - startTime,
  }

  log.info('Source run finished', {
    status,
    records: report.records,
    pages,
    duplicates,
    skipped,
    excluded,
    requests: report.fetch.requests,
    fallbacks: report.fetch.fallbacks,
  })

  return { report, records }
}
