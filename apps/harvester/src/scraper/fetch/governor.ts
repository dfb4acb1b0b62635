/**
 * Retrieval Governor
 *
 * Every page fetch of a source goes through here:
 * admission gate → pacing delay → primary transport → (once) fallback.
 * The escalation decision depends only on the primary failure kind.
 */

import type { ILogger } from '@pricegrid/logger'
import { FetchAbortedError, SourceUnavailableError, isFallbackEligible } from '../errors.js'
import type { TransportFailureKind } from '../errors.js'
import type { FetchCallOptions, FetchedBody, PageFetcher, RequestDescriptor, Transport, TransportResult } from '../types.js'
import type { SourceRateLimiter } from './rate-limiter.js'

export interface GovernorOptions {
  source: string
  /** Hosts requests may target; taken from the source's base URLs */
  baseUrls: string[]
  primary: Transport
  fallback: Transport
  limiter: SourceRateLimiter
  log: ILogger
}

export interface GovernorStats {
  requests: number
  fallbacks: number
  failures: number
}

export class RetrievalGovernor implements PageFetcher {
  private readonly source: string
  private readonly allowedHosts: Set<string>
  private readonly primary: Transport
  private readonly fallback: Transport
  private readonly limiter: SourceRateLimiter
  private readonly log: ILogger
  private readonly counters: GovernorStats = { requests: 0, fallbacks: 0, failures: 0 }

  constructor(options: GovernorOptions) {
    this.source = options.source
    this.allowedHosts = new Set(options.baseUrls.map(baseUrl => new URL(baseUrl).hostname.toLowerCase()))
    this.primary = options.primary
    this.fallback = options.fallback
    this.limiter = options.limiter
    this.log = options.log
  }

  get stats(): GovernorStats {
    return { ...this.counters }
  }

  async fetch(request: RequestDescriptor, options: FetchCallOptions = {}): Promise<FetchedBody> {
    const { signal } = options
    this.assertAllowedHost(request.url)

    const release = await this.limiter.acquire(request.url, signal)
    try {
      const primary = await this.attempt(this.primary, request, signal)
      if (primary.status === 'ok') {
        return toBody(primary)
      }

      if (!isFallbackEligible(primary.kind)) {
        this.counters.failures++
        this.log.warn('Fetch failed, not eligible for fallback', {
          url: request.url,
          kind: primary.kind,
          statusCode: primary.statusCode,
          error: primary.error,
        })
        throw new SourceUnavailableError({
          kind: primary.kind,
          attempts: [primary.kind],
          url: request.url,
          statusCode: primary.statusCode,
          detail: primary.error,
        })
      }

      this.counters.fallbacks++
      this.log.info('Primary transport failed, retrying via fallback', {
        url: request.url,
        kind: primary.kind,
        durationMs: primary.durationMs,
      })

      const fallback = await this.attempt(this.fallback, request, signal)
      if (fallback.status === 'ok') {
        return toBody(fallback)
      }

      this.counters.failures++
      const attempts: TransportFailureKind[] = [primary.kind, fallback.kind]
      this.log.warn('Fallback transport failed', {
        url: request.url,
        attempts,
        statusCode: fallback.statusCode,
        error: fallback.error,
      })
      throw new SourceUnavailableError({
        kind: fallback.kind,
        attempts,
        url: request.url,
        statusCode: fallback.statusCode,
        detail: fallback.error,
      })
    } finally {
      release()
    }
  }

  private async attempt(transport: Transport, request: RequestDescriptor, signal?: AbortSignal): Promise<TransportResult> {
    await this.limiter.pace(signal)
    if (signal?.aborted) {
      throw new FetchAbortedError(request.url)
    }

    this.counters.requests++
    const result = await transport.send(request, { signal })
    this.log.debug('Transport call finished', {
      transport: transport.name,
      method: request.method,
      url: request.url,
      status: result.status,
      durationMs: result.durationMs,
    })
    return result
  }

  private assertAllowedHost(url: string): void {
    let host: string
    try {
      host = new URL(url).hostname.toLowerCase()
    } catch {
      throw new SourceUnavailableError({ kind: 'NetworkError', attempts: [], url, detail: 'invalid request URL' })
    }
    if (!this.allowedHosts.has(host)) {
      throw new SourceUnavailableError({
        kind: 'NetworkError',
        attempts: [],
        url,
        detail: `host ${host} is not a base host of ${this.source}`,
      })
    }
  }
}

function toBody(result: Extract<TransportResult, { status: 'ok' }>): FetchedBody {
  return {
    url: result.response.url,
    statusCode: result.response.statusCode,
    text: result.response.text,
  }
}
