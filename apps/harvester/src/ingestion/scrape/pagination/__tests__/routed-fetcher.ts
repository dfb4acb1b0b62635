import { FetchAbortedError } from '../../../../scraper/errors.js'
import type { FetchCallOptions, FetchedBody, PageFetcher, RequestDescriptor } from '../../../../scraper/types.js'

export type RouteAnswer = { body: string; delayMs?: number } | { error: Error; delayMs?: number }

export type Route = (request: RequestDescriptor) => RouteAnswer

/**
 * In-process PageFetcher: answers from a route function, records every
 * request and the highest number of requests in flight at once.
 */
export class RoutedFetcher implements PageFetcher {
  readonly requests: RequestDescriptor[] = []
  maxInFlight = 0
  private inFlight = 0

  constructor(private readonly route: Route) {}

  async fetch(request: RequestDescriptor, options?: FetchCallOptions): Promise<FetchedBody> {
    this.requests.push(request)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      const answer = this.route(request)
      await new Promise(resolve => setTimeout(resolve, answer.delayMs ?? 0))
      if (options?.signal?.aborted) {
        throw new FetchAbortedError(request.url)
      }
      if ('error' in answer) {
        throw answer.error
      }
      return { url: request.url, statusCode: 200, text: answer.body }
    } finally {
      this.inFlight--
    }
  }

  urls(): string[] {
    return this.requests.map(request => request.url)
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) {
    items.push(item)
  }
  return items
}

/** Pages received before the iteration threw, and the error */
export async function collectUntilError<T>(iterable: AsyncIterable<T>): Promise<{ items: T[]; error: unknown }> {
  const items: T[] = []
  try {
    for await (const item of iterable) {
      items.push(item)
    }
  } catch (error) {
    return { items, error }
  }
  return { items, error: undefined }
}

export function queryParam(request: RequestDescriptor, name: string): string | null {
  return new URL(request.url).searchParams.get(name)
}
