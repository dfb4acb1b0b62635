/**
 * Fallback transport: got-scraping, which negotiates TLS and sends headers
 * the way a desktop Chrome does. Slower and heavier than native fetch, so
 * the governor only calls it after an eligible primary failure.
 */

import { gotScraping } from 'got-scraping'
import { FetchAbortedError, errorCodeOf, errorNameOf } from '../errors.js'
import type { TransportFailureKind } from '../errors.js'
import type { FetchCallOptions, RequestDescriptor, Transport, TransportOptions, TransportResult } from '../types.js'
import { DEFAULT_TRANSPORT_OPTIONS } from '../types.js'
import { decodeBody, unsupportedContentEncoding } from './decode.js'

export interface ImpersonatingClientResponse {
  url: string
  statusCode: number
  headers: Record<string, string | string[] | undefined>
  body: Uint8Array
}

/**
 * The HTTP call itself, isolated so tests can stand in for got-scraping.
 * Rejects on network failures; never on HTTP status.
 */
export type ImpersonatingClient = (
  request: RequestDescriptor,
  options: { timeoutMs: number; signal?: AbortSignal }
) => Promise<ImpersonatingClientResponse>

export const gotScrapingClient: ImpersonatingClient = async (request, { timeoutMs, signal }) => {
  const pending = gotScraping(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    responseType: 'buffer',
    throwHttpErrors: false,
    followRedirect: true,
    timeout: { request: timeoutMs },
  })

  const onAbort = () => pending.cancel()
  signal?.addEventListener('abort', onAbort, { once: true })
  try {
    const response = await pending
    return {
      url: response.url,
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    }
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}

function headerValue(headers: ImpersonatingClientResponse['headers'], name: string): string | undefined {
  const value = headers[name]
  return Array.isArray(value) ? value.join(', ') : value
}

export function classifyClientError(error: unknown): TransportFailureKind {
  const name = errorNameOf(error)
  const code = errorCodeOf(error)
  if (name === 'TimeoutError' || code === 'ETIMEDOUT') return 'Timeout'
  if (code === 'ECONNREFUSED') return 'ConnectionRefused'
  if (code?.startsWith('Z_') || code === 'ERR_BODY_PARSE_FAILURE') return 'ProtocolError'
  return 'NetworkError'
}

export interface ImpersonatingFetcherOptions extends Partial<TransportOptions> {
  client?: ImpersonatingClient
}

export class ImpersonatingFetcher implements Transport {
  readonly name = 'fallback'
  private readonly options: TransportOptions
  private readonly client: ImpersonatingClient

  constructor(options: ImpersonatingFetcherOptions = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? DEFAULT_TRANSPORT_OPTIONS.fallbackTimeoutMs,
      decodeReplacementRatio: options.decodeReplacementRatio ?? DEFAULT_TRANSPORT_OPTIONS.decodeReplacementRatio,
    }
    this.client = options.client ?? gotScrapingClient
  }

  async send(request: RequestDescriptor, options: FetchCallOptions = {}): Promise<TransportResult> {
    const startTime = Date.now()
    const { signal } = options

    if (signal?.aborted) {
      throw new FetchAbortedError(request.url)
    }

    const failed = (kind: TransportFailureKind, error: string, statusCode?: number): TransportResult => ({
      status: 'failed',
      kind,
      statusCode,
      error,
      durationMs: Date.now() - startTime,
    })

    let response: ImpersonatingClientResponse
    try {
      response = await this.client(request, { timeoutMs: this.options.timeoutMs, signal })
    } catch (error) {
      if (signal?.aborted) {
        throw new FetchAbortedError(request.url)
      }
      return failed(classifyClientError(error), error instanceof Error ? error.message : String(error))
    }

    if (response.statusCode === 403) {
      return failed('ForbiddenStatus', 'HTTP 403: request blocked', 403)
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      return failed('HttpStatus', `HTTP ${response.statusCode}`, response.statusCode)
    }

    const unsupported = unsupportedContentEncoding(headerValue(response.headers, 'content-encoding'))
    if (unsupported) {
      return failed('ProtocolError', `Unsupported content-encoding: ${unsupported}`, response.statusCode)
    }

    const contentType = headerValue(response.headers, 'content-type')
    const decoded = decodeBody(response.body, contentType, this.options.decodeReplacementRatio)
    if (!decoded.ok) {
      return failed(decoded.kind, decoded.error, response.statusCode)
    }

    return {
      status: 'ok',
      response: {
        url: response.url || request.url,
        statusCode: response.statusCode,
        contentType,
        text: decoded.text,
      },
      durationMs: Date.now() - startTime,
    }
  }
}
