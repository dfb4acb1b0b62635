import { createLogger, createMemorySink } from '@pricegrid/logger'
import { describe, expect, it } from 'vitest'
import type { CrawlConfig } from '../../config/crawl.js'
import type { SourceManifest } from '../../ingestion/scrape/types.js'
import type { RequestDescriptor } from '../../scraper/types.js'
import { createRunContext, sourceRateLimit } from '../context.js'
import { runSource } from '../run-source.js'
import { noSleep, RoutedTransport, routedTransports } from './routed-transport.js'
import type { TransportAnswer } from './routed-transport.js'

const config: CrawlConfig = {
  concurrency: 3,
  delayMs: 0,
  primaryTimeoutMs: 1000,
  fallbackTimeoutMs: 1000,
  decodeReplacementRatio: 0.01,
  dataDir: 'unused',
  sources: ['irshad'],
}

const manifest: SourceManifest = {
  id: 'irshad',
  label: 'irshad.az',
  version: 'test',
  baseUrls: ['https://irshad.az'],
  identity: { productId: 'code', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://irshad.az/list' },
    page: { in: 'query', name: 'page' },
    lastPage: [{ kind: 'labels', selector: '.pages a' }],
  },
  records: {
    source: { kind: 'html', itemSelector: '.product' },
    fields: [
      { field: 'code', rules: [{ kind: 'attr', attr: 'data-code' }] },
      { field: 'price_current', rules: [{ kind: 'text', selector: '.price' }], clean: 'price' },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a', attr: 'href', transforms: ['absoluteUrl'] }] },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: {},
}

function listing(products: Array<[string, number]>): string {
  const cards = products
    .map(([code, price]) => `<div class="product" data-code="${code}"><a href="/p/${code}">${code}</a><span class="price">${price}</span></div>`)
    .join('')
  return `${cards}<div class="pages"><a>1</a><a>2</a><a>3</a></div>`
}

const PAGES: Record<string, Array<[string, number]>> = {
  '1': [
    ['A', 100],
    ['B', 200],
  ],
  '2': [
    ['C', 300],
    ['D', 400],
  ],
  '3': [
    ['E', 500],
    ['A', 90],
  ],
}

/** Listings P1..Pn priced 10 per position, except the priceless ones */
function catalogOf(size: number, priceless: string[]): Array<{ code: string; price: number | null }> {
  return Array.from({ length: size }, (_, position) => {
    const code = `P${position + 1}`
    return { code, price: priceless.includes(code) ? null : (position + 1) * 10 }
  })
}

function pageOf(request: RequestDescriptor): string {
  return new URL(request.url).searchParams.get('page') ?? '1'
}

function run(route: (request: RequestDescriptor) => TransportAnswer, source: SourceManifest = manifest) {
  const sink = createMemorySink()
  const context = createRunContext(source, config, {
    runId: 'run-1',
    transports: routedTransports(route),
    sleep: noSleep,
    log: createLogger('test', { sink, level: 'info' }),
  })
  return { result: runSource(context), sink }
}

describe('runSource', () => {
  it('extracts every page and keeps the last duplicate at its first position', async () => {
    const { result } = run(request => ({ body: listing(PAGES[pageOf(request)] ?? []) }))
    const { report, records } = await result

    expect(report).toMatchObject({
      source: 'irshad',
      runId: 'run-1',
      status: 'ok',
      pages: 3,
      extracted: 6,
      records: 5,
      duplicates: 1,
      skipped: 0,
    })
    expect(report.failure).toBeUndefined()
    expect(records.map(record => record.code)).toEqual(['A', 'B', 'C', 'D', 'E'])
    expect(records[0]).toEqual({ code: 'A', price_current: 90, url: 'https://irshad.az/p/A', page: 3 })
  })

  it('keeps the pages already fetched when the source becomes unavailable', async () => {
    const { result, sink } = run(request => {
      const page = pageOf(request)
      if (page === '3') return { fail: 'HttpStatus', statusCode: 503, delayMs: 20 }
      return { body: listing(PAGES[page] ?? []) }
    })
    const { report, records } = await result

    expect(report.status).toBe('partial')
    expect(report.pages).toBe(2)
    expect(report.partialRecordCount).toBe(4)
    expect(report.failure).toMatchObject({ kind: 'SourceUnavailable', transportKind: 'HttpStatus' })
    expect(records.map(record => record.code)).toEqual(['A', 'B', 'C', 'D'])
    expect(sink.entries.some(entry => entry.message === 'Source run failed' && entry.source === 'irshad')).toBe(true)
  })

  it('fails with no records when the first page cannot be fetched', async () => {
    const { result } = run(() => ({ fail: 'ConnectionRefused' }))
    const { report, records } = await result

    expect(report.status).toBe('failed')
    expect(report.partialRecordCount).toBe(0)
    expect(report.fetch).toEqual({ requests: 1, fallbacks: 0, failures: 1 })
    expect(records).toEqual([])
  })

  it('discards everything on schema drift', async () => {
    const strict: SourceManifest = {
      ...manifest,
      records: {
        ...manifest.records,
        fields: manifest.records.fields.map(field => (field.field === 'price_current' ? { ...field, required: true } : field)),
      },
    }
    const { result } = run(request => {
      const page = pageOf(request)
      // Page 2 lost its prices
      const body = listing(PAGES[page] ?? [])
      return { body: page === '2' ? body.replace(/<span class="price">\d+<\/span>/g, '') : body }
    }, strict)
    const { report, records } = await result

    expect(report.status).toBe('failed')
    expect(report.failure).toMatchObject({ kind: 'SchemaDrift', field: 'price_current', page: 2 })
    expect(report.partialRecordCount).toBe(2)
    expect(records).toEqual([])
  })

  it('counts every listing of a paged catalog and the priceless ones it excludes', async () => {
    const catalog = catalogOf(50, ['P5', 'P45'])
    const paged: SourceManifest = { ...manifest, records: { ...manifest.records, excludeWhenMissing: ['price_current'] } }
    const { result } = run(request => {
      const start = (Number(pageOf(request)) - 1) * 20
      const cards = catalog
        .slice(start, start + 20)
        .map(({ code, price }) => {
          const priceTag = price === null ? '' : `<span class="price">${price}</span>`
          return `<div class="product" data-code="${code}"><a href="/p/${code}">${code}</a>${priceTag}</div>`
        })
        .join('')
      return { body: `${cards}<div class="pages"><a>1</a><a>2</a><a>3</a></div>` }
    }, paged)
    const { report, records } = await result

    expect(report).toMatchObject({ status: 'ok', pages: 3, extracted: 48, excluded: 2, records: 48, duplicates: 0 })
    expect(records.map(record => record.code)).not.toContain('P45')
  })

  it('counts every listing below a declared total and the priceless ones it excludes', async () => {
    const catalog = catalogOf(50, ['P10', 'P40'])
    const offsets: SourceManifest = {
      ...manifest,
      id: 'mgstore',
      label: 'mgstore.az',
      baseUrls: ['https://mgstore.az'],
      identity: { productId: 'code', url: 'url' },
      pagination: {
        strategy: 'offset-batch',
        format: 'json',
        request: { url: 'https://mgstore.az/api/products' },
        batchSize: 24,
        offset: { in: 'query', name: 'offset' },
        limit: { in: 'query', name: 'limit' },
        total: { kind: 'json', path: 'total' },
      },
      records: {
        source: { kind: 'json', itemsPath: 'products' },
        excludeWhenMissing: ['price_current'],
        fields: [
          { field: 'code', required: true, rules: [{ kind: 'json', path: 'code' }] },
          { field: 'price_current', rules: [{ kind: 'json', path: 'price' }], clean: 'price' },
          { field: 'url', rules: [{ kind: 'json', path: 'code', prefix: 'https://mgstore.az/p/' }] },
        ],
      },
    }
    const { result } = run(request => {
      const offset = Number(new URL(request.url).searchParams.get('offset'))
      return { body: JSON.stringify({ total: catalog.length, products: catalog.slice(offset, offset + 24) }) }
    }, offsets)
    const { report, records } = await result

    expect(report).toMatchObject({ status: 'ok', pages: 3, extracted: 48, excluded: 2, records: 48, duplicates: 0 })
    expect(report.fetch.requests).toBe(3)
    expect(records.at(-1)).toEqual({ code: 'P50', price_current: 500, url: 'https://mgstore.az/p/P50' })
  })

  it('escalates to the fallback transport and counts it', async () => {
    const sink = createMemorySink()
    const context = createRunContext(manifest, config, {
      transports: () => ({
        primary: new RoutedTransport('primary', () => ({ fail: 'ForbiddenStatus', statusCode: 403 })),
        fallback: new RoutedTransport('fallback', request => ({ body: listing(PAGES[pageOf(request)] ?? []) })),
      }),
      sleep: noSleep,
      log: createLogger('test', { sink, level: 'info' }),
    })

    const { report } = await runSource(context)

    expect(report.status).toBe('ok')
    expect(report.fetch).toEqual({ requests: 6, fallbacks: 3, failures: 0 })
  })
})

describe('sourceRateLimit', () => {
  it('lets a manifest tighten but never loosen the configured limits', () => {
    expect(sourceRateLimit({ ...manifest, rateLimit: { maxConcurrent: 2, minDelayMs: 2500 } }, config)).toEqual({
      maxConcurrent: 2,
      minDelayMs: 2500,
    })
    expect(sourceRateLimit({ ...manifest, rateLimit: { maxConcurrent: 10, minDelayMs: 0 } }, { ...config, delayMs: 500 })).toEqual({
      maxConcurrent: 3,
      minDelayMs: 500,
    })
  })
})
