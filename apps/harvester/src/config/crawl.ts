/**
 * Crawl configuration
 *
 * Parsed once from the environment; every value has a default so a bare
 * `npm run crawl` works. Manifests may tighten concurrency and delay per
 * source.
 */

import { z } from 'zod'
import { isSourceId, SOURCE_IDS } from '../ingestion/scrape/types.js'
import type { SourceId } from '../ingestion/scrape/types.js'
import { DEFAULT_RATE_LIMIT, DEFAULT_TRANSPORT_OPTIONS } from '../scraper/types.js'

export interface CrawlConfig {
  /** In-flight requests per source */
  concurrency: number
  /** Pause before every request, per source */
  delayMs: number
  primaryTimeoutMs: number
  fallbackTimeoutMs: number
  /** Share of U+FFFD characters tolerated in a decoded body */
  decodeReplacementRatio: number
  dataDir: string
  sources: SourceId[]
}

const sourceListSchema = z
  .string()
  .optional()
  .transform((raw, ctx): SourceId[] => {
    const requested = (raw ?? '')
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
    if (requested.length === 0) return [...SOURCE_IDS]

    const sources: SourceId[] = []
    for (const entry of requested) {
      if (!isSourceId(entry)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown source '${entry}'` })
        continue
      }
      if (!sources.includes(entry)) sources.push(entry)
    }
    return sources
  })

const crawlEnvSchema = z.object({
  CRAWL_CONCURRENCY: z.coerce.number().int().min(1).default(DEFAULT_RATE_LIMIT.maxConcurrent),
  CRAWL_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RATE_LIMIT.minDelayMs),
  PRIMARY_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_TRANSPORT_OPTIONS.primaryTimeoutMs),
  FALLBACK_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_TRANSPORT_OPTIONS.fallbackTimeoutMs),
  DECODE_REPLACEMENT_RATIO: z.coerce.number().min(0).max(1).default(DEFAULT_TRANSPORT_OPTIONS.decodeReplacementRatio),
  DATA_DIR: z.string().trim().min(1).default('data'),
  CRAWL_SOURCES: sourceListSchema,
})

export type ParseCrawlConfigResult = { ok: true; config: CrawlConfig } | { ok: false; error: string }

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {}
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value
  }
  return cleaned
}

export function parseCrawlConfig(env: NodeJS.ProcessEnv = process.env): ParseCrawlConfigResult {
  const parsed = crawlEnvSchema.safeParse(emptyToUndefined(env))
  if (!parsed.success) {
    const error = parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('; ')
    return { ok: false, error }
  }

  const value = parsed.data
  return {
    ok: true,
    config: {
      concurrency: value.CRAWL_CONCURRENCY,
      delayMs: value.CRAWL_DELAY_MS,
      primaryTimeoutMs: value.PRIMARY_TIMEOUT_MS,
      fallbackTimeoutMs: value.FALLBACK_TIMEOUT_MS,
      decodeReplacementRatio: value.DECODE_REPLACEMENT_RATIO,
      dataDir: value.DATA_DIR,
      sources: value.CRAWL_SOURCES,
    },
  }
}

/** Parse the environment or throw with every problem listed */
export function loadCrawlConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  const result = parseCrawlConfig(env)
  if (!result.ok) {
    throw new Error(`Invalid crawl configuration: ${result.error}`)
  }
  return result.config
}
