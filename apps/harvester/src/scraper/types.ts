/**
 * Transport & Governor Types
 *
 * Shared contract between the two transports (native fetch and the
 * browser-impersonating client), the retrieval governor and the pagination
 * strategies that drive it.
 */

import type { TransportFailureKind } from './errors.js'

// ============================================================================
// Requests
// ============================================================================

export type HttpMethod = 'GET' | 'POST'

/** One fully built HTTP request */
export interface RequestDescriptor {
  method: HttpMethod
  url: string
  headers: Record<string, string>
  body?: string
}

export interface FetchCallOptions {
  /** Aborted when a sibling page of the same source fails */
  signal?: AbortSignal
}

// ============================================================================
// Transport
// ============================================================================

export interface TransportResponse {
  /** Final URL after redirects */
  url: string
  statusCode: number
  contentType?: string
  text: string
}

export type TransportResult =
  | { status: 'ok'; response: TransportResponse; durationMs: number }
  | {
      status: 'failed'
      kind: TransportFailureKind
      statusCode?: number
      error: string
      durationMs: number
    }

/**
 * One request/response cycle. Failures come back as values; only a
 * caller abort is thrown (FetchAbortedError).
 */
export interface Transport {
  readonly name: string
  send(request: RequestDescriptor, options?: FetchCallOptions): Promise<TransportResult>
}

export interface TransportOptions {
  timeoutMs: number
  /** Share of U+FFFD tolerated after a failed strict decode */
  decodeReplacementRatio: number
}

// ============================================================================
// Governor
// ============================================================================

export interface FetchedBody {
  url: string
  statusCode: number
  text: string
}

/** What pagination strategies fetch through */
export interface PageFetcher {
  fetch(request: RequestDescriptor, options?: FetchCallOptions): Promise<FetchedBody>
}

export interface RateLimitConfig {
  /** In-flight request cap for one source */
  maxConcurrent: number
  /** Delay inserted before every request */
  minDelayMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxConcurrent: 3,
  minDelayMs: 1000,
}

export const DEFAULT_TRANSPORT_OPTIONS = {
  primaryTimeoutMs: 15_000,
  fallbackTimeoutMs: 120_000,
  decodeReplacementRatio: 0.01,
} as const

/**
 * Browser-like headers sent with every request unless a source overrides
 * them. Listing endpoints answer differently without Accept-Language.
 */
export const DEFAULT_REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'az,en-US;q=0.9,en;q=0.8,ru;q=0.7',
  'Accept-Encoding': 'gzip, deflate, br',
  'sec-ch-ua': '"Not(A:Brand";v="8","Chromium";v="144","Google Chrome";v="144"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"macOS"',
  DNT: '1',
}
