import { describe, it, expect, vi, afterEach } from 'vitest'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { FetchAbortedError } from '../errors.js'
import type { RequestDescriptor } from '../types.js'

const request: RequestDescriptor = {
  method: 'GET',
  url: 'https://shop.example/catalog?page=2',
  headers: { Accept: 'text/html' },
}

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('returns decoded text for a 200 response', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(
      new Response('<html>ok</html>', { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } })
    )
    globalThis.fetch = fetchSpy

    const result = await new HttpFetcher().send(request)

    expect(result.status).toBe('ok')
    if (result.status !== 'ok') return
    expect(result.response.text).toBe('<html>ok</html>')
    expect(result.response.statusCode).toBe(200)
    expect(result.response.url).toBe('https://shop.example/catalog?page=2')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://shop.example/catalog?page=2')
  })

  it('sends method, headers and body', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }))
    globalThis.fetch = fetchSpy

    await new HttpFetcher().send({
      method: 'POST',
      url: 'https://shop.example/graphql',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query":"{ ads }"}',
    })

    const init = fetchSpy.mock.calls[0]?.[1]
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query":"{ ads }"}',
    })
  })

  it('maps 403 to ForbiddenStatus', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('denied', { status: 403 }))

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'ForbiddenStatus', statusCode: 403 })
  })

  it('maps other non-2xx statuses to HttpStatus', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }))

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'HttpStatus', statusCode: 404 })
  })

  it('reports an unknown content-encoding as ProtocolError', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('compressed', { status: 200, headers: { 'content-encoding': 'zstd' } })
    )

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'ProtocolError' })
    if (result.status !== 'failed') return
    expect(result.error).toBe('Unsupported content-encoding: zstd')
  })

  it('reports undecodable bytes as DecodeError', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(new Blob([new Uint8Array([0xff, 0xfe, 0xfd, 0xfc])]), {
        status: 200,
        headers: { 'content-type': 'text/html; charset=utf-8' },
      })
    )

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'DecodeError' })
  })

  it('tolerates a few invalid bytes under the replacement ratio', async () => {
    const bytes = new Uint8Array(201)
    bytes.fill(0x61)
    bytes[100] = 0xff
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(new Blob([bytes]), { status: 200 }))

    const result = await new HttpFetcher().send(request)

    expect(result.status).toBe('ok')
    if (result.status !== 'ok') return
    expect(result.response.text).toHaveLength(201)
    expect(result.response.text[100]).toBe('\uFFFD')
  })

  it('decodes the charset declared in content-type', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(new Blob([new Uint8Array([0xcf, 0xf0, 0xe8])]), {
        status: 200,
        headers: { 'content-type': 'text/html; charset=windows-1251' },
      })
    )

    const result = await new HttpFetcher().send(request)

    expect(result.status).toBe('ok')
    if (result.status !== 'ok') return
    expect(result.response.text).toBe('При')
  })

  it('times out a request that never answers', async () => {
    globalThis.fetch = vi.fn(
      (_input: unknown, init?: { signal?: AbortSignal | null }) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
        })
    )

    const result = await new HttpFetcher({ timeoutMs: 5 }).send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'Timeout' })
    if (result.status !== 'failed') return
    expect(result.error).toBe('Request timed out after 5ms')
  })

  it('maps a refused connection to ConnectionRefused', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' })
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause }))

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'ConnectionRefused' })
  })

  it('maps other network errors to NetworkError', async () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND shop.example'), { code: 'ENOTFOUND' })
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause }))

    const result = await new HttpFetcher().send(request)

    expect(result).toMatchObject({ status: 'failed', kind: 'NetworkError', error: 'fetch failed' })
  })

  it('throws FetchAbortedError when the caller aborts', async () => {
    const controller = new AbortController()
    globalThis.fetch = vi.fn(
      (_input: unknown, init?: { signal?: AbortSignal | null }) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
        })
    )

    const pending = new HttpFetcher({ timeoutMs: 10_000 }).send(request, { signal: controller.signal })
    controller.abort()

    await expect(pending).rejects.toBeInstanceOf(FetchAbortedError)
  })

  it('does not call fetch when the signal is already aborted', async () => {
    const fetchSpy = vi.fn()
    globalThis.fetch = fetchSpy
    const controller = new AbortController()
    controller.abort()

    await expect(new HttpFetcher().send(request, { signal: controller.signal })).rejects.toBeInstanceOf(FetchAbortedError)
    expect(fetchSpy).not.toHaveBeenCalled()
  })
})
