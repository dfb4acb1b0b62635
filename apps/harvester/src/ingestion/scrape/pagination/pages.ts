import type { ILogger } from '@pricegrid/logger'
import { FetchAbortedError, SchemaDriftError } from '../../../scraper/errors.js'
import type { FetchedBody, PageFetcher, RequestDescriptor } from '../../../scraper/types.js'
import { safeJsonParse } from '../kit/json.js'
import type { PageFormat, RawPage } from '../types.js'

/** Shared inputs of every strategy run */
export interface StrategyContext {
  /** Source default headers merged into every request */
  headers: Record<string, string>
  /** `{token}` values (the build identifier) */
  vars?: Record<string, string>
  /** Page 1 obtained some other way (embedded in a bootstrap document) */
  seed?: RawPage
  log?: ILogger
}

export interface PageStep {
  index: number
  offset?: number
  request: RequestDescriptor
  /** The source announced listings for this step */
  expectListings?: boolean
}

export const DEFAULT_MAX_PAGES = 500

export function toRawPage(step: PageStep, body: FetchedBody, format: PageFormat): RawPage {
  const page: RawPage = {
    index: step.index,
    offset: step.offset,
    url: step.request.url,
    format,
    body: body.text,
  }
  if (step.expectListings) {
    page.expectListings = true
  }
  if (format === 'json') {
    const parsed = safeJsonParse(body.text)
    if (!parsed.ok) {
      throw new SchemaDriftError(`response is not JSON: ${parsed.error}`, { page: step.index })
    }
    page.data = parsed.value
  }
  return page
}

export async function fetchPage(fetcher: PageFetcher, step: PageStep, format: PageFormat, signal?: AbortSignal): Promise<RawPage> {
  const body = await fetcher.fetch(step.request, { signal })
  return toRawPage(step, body, format)
}

type StepOutcome = { ok: true; page: RawPage } | { ok: false; error: unknown }

/**
 * Dispatch independent page requests at once (the governor bounds how many
 * are in flight) and yield the pages in step order.
 *
 * The first real failure cancels the requests still queued or in flight;
 * pages that did arrive are still yielded, then the failure is thrown.
 */
export async function* fetchConcurrently(
  fetcher: PageFetcher,
  steps: PageStep[],
  format: PageFormat
): AsyncGenerator<RawPage> {
  const controller = new AbortController()

  const run = async (step: PageStep): Promise<StepOutcome> => {
    try {
      return { ok: true, page: await fetchPage(fetcher, step, format, controller.signal) }
    } catch (error) {
      if (!(error instanceof FetchAbortedError)) {
        controller.abort()
      }
      return { ok: false, error }
    }
  }

  const outcomes = steps.map(run)
  let failure: { error: unknown } | undefined

  try {
    for (const pending of outcomes) {
      const outcome = await pending
      if (outcome.ok) {
        yield outcome.page
      } else if (!failure && !(outcome.error instanceof FetchAbortedError)) {
        failure = { error: outcome.error }
      }
    }
  } finally {
    controller.abort()
  }

  if (failure) {
    throw failure.error
  }
}
