export { runCrawl } from './pipeline/run-crawl.js'
export type { CrawlReport, RunCrawlOptions } from './pipeline/run-crawl.js'
export { runSource } from './pipeline/run-source.js'
export type { SourceReport, SourceResult, SourceRunStatus } from './pipeline/run-source.js'
export { createRunContext, defaultTransports } from './pipeline/context.js'
export type { RunContext, TransportFactory, TransportPair } from './pipeline/context.js'
export { loadCrawlConfig, parseCrawlConfig } from './config/crawl.js'
export type { CrawlConfig } from './config/crawl.js'
export { combineFromDirectory, writeMasterFile, writeSourceFile } from './combine/files.js'
export { combineSources, unifySource } from './combine/unify.js'
export { CANONICAL_COLUMNS } from './combine/schema.js'
export type { CanonicalColumn, CanonicalRecord } from './combine/schema.js'
export { createSourceRegistry, getSourceRegistry } from './ingestion/scrape/registry.js'
export { SOURCE_IDS } from './ingestion/scrape/types.js'
export type { SourceId, SourceManifest } from './ingestion/scrape/types.js'
export * from './scraper/errors.js'
