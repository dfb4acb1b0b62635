/**
 * Per-source run context
 *
 * Everything one source run needs, built fresh for every run and passed
 * explicitly: admission gate and pacing, transports, governor, pagination
 * strategy and a logger tagged with the source and run id.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@pricegrid/logger'
import type { CrawlConfig } from '../config/crawl.js'
import { createStrategy } from '../ingestion/scrape/pagination/index.js'
import type { PaginationStrategy } from '../ingestion/scrape/pagination/index.js'
import type { SourceManifest } from '../ingestion/scrape/types.js'
import { RetrievalGovernor } from '../scraper/fetch/governor.js'
import { HttpFetcher } from '../scraper/fetch/http-fetcher.js'
import { ImpersonatingFetcher } from '../scraper/fetch/impersonating-fetcher.js'
import { SourceRateLimiter } from '../scraper/fetch/rate-limiter.js'
import type { Sleep } from '../scraper/fetch/rate-limiter.js'
import { DEFAULT_REQUEST_HEADERS } from '../scraper/types.js'
import type { RateLimitConfig, Transport } from '../scraper/types.js'

export interface TransportPair {
  primary: Transport
  fallback: Transport
}

export type TransportFactory = (manifest: SourceManifest, config: CrawlConfig) => TransportPair

export interface RunContext {
  runId: string
  manifest: SourceManifest
  config: CrawlConfig
  log: ILogger
  limiter: SourceRateLimiter
  governor: RetrievalGovernor
  strategy: PaginationStrategy
}

export interface CreateRunContextOptions {
  runId?: string
  transports?: TransportFactory
  sleep?: Sleep
  log: ILogger
}

export const defaultTransports: TransportFactory = (_manifest, config) => ({
  primary: new HttpFetcher({
    timeoutMs: config.primaryTimeoutMs,
    decodeReplacementRatio: config.decodeReplacementRatio,
  }),
  fallback: new ImpersonatingFetcher({
    timeoutMs: config.fallbackTimeoutMs,
    decodeReplacementRatio: config.decodeReplacementRatio,
  }),
})

/** A manifest can only tighten the configured limits */
export function sourceRateLimit(manifest: SourceManifest, config: CrawlConfig): RateLimitConfig {
  return {
    maxConcurrent: Math.min(config.concurrency, manifest.rateLimit?.maxConcurrent ?? config.concurrency),
    minDelayMs: Math.max(config.delayMs, manifest.rateLimit?.minDelayMs ?? config.delayMs),
  }
}

export function createRunContext(manifest: SourceManifest, config: CrawlConfig, options: CreateRunContextOptions): RunContext {
  const runId = options.runId ?? randomUUID()
  const log = options.log.child({ source: manifest.id, runId })
  const limiter = new SourceRateLimiter(sourceRateLimit(manifest, config), { sleep: options.sleep })
  const { primary, fallback } = (options.transports ?? defaultTransports)(manifest, config)

  const governor = new RetrievalGovernor({
    source: manifest.id,
    baseUrls: manifest.baseUrls,
    primary,
    fallback,
    limiter,
    log,
  })

  const strategy = createStrategy(manifest.pagination, {
    headers: { ...DEFAULT_REQUEST_HEADERS, ...manifest.headers },
    log,
  })

  return { runId, manifest, config, log, limiter, governor, strategy }
}
