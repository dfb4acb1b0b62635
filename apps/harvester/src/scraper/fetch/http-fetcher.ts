/**
 * Primary transport: native fetch with a short total timeout.
 *
 * Bot challenges tend to hold the connection open instead of answering,
 * so the timeout is the signal that the fallback transport should take
 * over.
 */

import { FetchAbortedError, errorCodeOf, errorNameOf } from '../errors.js'
import type { TransportFailureKind } from '../errors.js'
import type { FetchCallOptions, RequestDescriptor, Transport, TransportOptions, TransportResult } from '../types.js'
import { DEFAULT_TRANSPORT_OPTIONS } from '../types.js'
import { decodeBody, unsupportedContentEncoding } from './decode.js'

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'])

export function classifyFetchError(error: unknown): TransportFailureKind {
  const code = errorCodeOf(error)
  if (code === 'ECONNREFUSED') return 'ConnectionRefused'
  if (code && TIMEOUT_CODES.has(code)) return 'Timeout'
  if (code?.startsWith('Z_') || code === 'ERR_INVALID_CHUNKED_ENCODING') return 'ProtocolError'
  return 'NetworkError'
}

export class HttpFetcher implements Transport {
  readonly name = 'primary'
  private readonly options: TransportOptions

  constructor(options: Partial<TransportOptions> = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? DEFAULT_TRANSPORT_OPTIONS.primaryTimeoutMs,
      decodeReplacementRatio: options.decodeReplacementRatio ?? DEFAULT_TRANSPORT_OPTIONS.decodeReplacementRatio,
    }
  }

  async send(request: RequestDescriptor, options: FetchCallOptions = {}): Promise<TransportResult> {
    const startTime = Date.now()
    const { signal } = options

    if (signal?.aborted) {
      throw new FetchAbortedError(request.url)
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.options.timeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    const failed = (kind: TransportFailureKind, error: string, statusCode?: number): TransportResult => ({
      status: 'failed',
      kind,
      statusCode,
      error,
      durationMs: Date.now() - startTime,
    })

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403) {
        return failed('ForbiddenStatus', 'HTTP 403: request blocked', 403)
      }

      if (!response.ok) {
        return failed('HttpStatus', `HTTP ${response.status}: ${response.statusText}`, response.status)
      }

      const unsupported = unsupportedContentEncoding(response.headers.get('content-encoding'))
      if (unsupported) {
        return failed('ProtocolError', `Unsupported content-encoding: ${unsupported}`, response.status)
      }

      const bytes = new Uint8Array(await response.arrayBuffer())
      const contentType = response.headers.get('content-type') ?? undefined
      const decoded = decodeBody(bytes, contentType, this.options.decodeReplacementRatio)
      if (!decoded.ok) {
        return failed(decoded.kind, decoded.error, response.status)
      }

      return {
        status: 'ok',
        response: {
          url: response.url || request.url,
          statusCode: response.status,
          contentType,
          text: decoded.text,
        },
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (signal?.aborted) {
        throw new FetchAbortedError(request.url)
      }
      if (timedOut || errorNameOf(error) === 'AbortError') {
        return failed('Timeout', `Request timed out after ${this.options.timeoutMs}ms`)
      }
      return failed(classifyFetchError(error), error instanceof Error ? error.message : String(error))
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
