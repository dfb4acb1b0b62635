import { describe, expect, it } from 'vitest'
import { SchemaDriftError } from '../../../../scraper/errors.js'
import { isRecord } from '../../kit/json.js'
import type { OffsetBatchPlan, RawPage } from '../../types.js'
import { driveOffsetBatch, resolveTotal } from '../offset-batch.js'
import { collect, collectUntilError, queryParam, RoutedFetcher } from './routed-fetcher.js'

const plan: OffsetBatchPlan = {
  strategy: 'offset-batch',
  format: 'json',
  request: { url: 'https://shop.example.az/api/products', query: { category: 'plansetler' } },
  batchSize: 24,
  offset: { in: 'query', name: 'offset' },
  limit: { in: 'query', name: 'limit' },
  total: { kind: 'json', path: 'meta.total' },
}

/** Serves `total` items in batches of 24, each item being its position */
function totalResponder(total: number) {
  return new RoutedFetcher(request => {
    const offset = Number(queryParam(request, 'offset'))
    const count = Math.max(0, Math.min(24, total - offset))
    const items = Array.from({ length: count }, (_, position) => offset + position)
    return { body: JSON.stringify({ meta: { total }, items }) }
  })
}

describe('resolveTotal', () => {
  it('reads a JSON total', () => {
    const page: RawPage = { index: 1, url: 'https://shop.example.az', format: 'json', body: '{"meta":{"total":"57"}}' }
    expect(resolveTotal({ kind: 'json', path: 'meta.total' }, page)).toBe(57)
  })

  it('reads a total from page text with grouped digits', () => {
    const page: RawPage = { index: 1, url: 'https://shop.example.az', format: 'html', body: '<span class="found">Tapıldı: 1.024</span>' }
    expect(resolveTotal({ kind: 'count', selector: '.found' }, page)).toBe(1024)
  })

  it('raises schema drift when the total is missing', () => {
    const page: RawPage = { index: 1, url: 'https://shop.example.az', format: 'json', body: '{"meta":{}}' }
    expect(() => resolveTotal({ kind: 'json', path: 'meta.total' }, page)).toThrow(
      'Schema drift: declared total item count not found (field=meta.total, page=1)'
    )
  })
})

describe('driveOffsetBatch', () => {
  it.each([
    { total: 0, offsets: [0] },
    { total: 24, offsets: [0] },
    { total: 25, offsets: [0, 24] },
    { total: 100, offsets: [0, 24, 48, 72, 96] },
  ])('requests every offset below a declared total of $total', async ({ total, offsets }) => {
    const fetcher = totalResponder(total)

    const pages = await collect(driveOffsetBatch(plan, fetcher, { headers: {} }))

    expect(pages.map(page => page.offset)).toEqual(offsets)
    expect(pages.map(page => page.index)).toEqual(offsets.map((_, position) => position + 1))
    expect(fetcher.requests.map(request => queryParam(request, 'offset'))).toEqual(offsets.map(String))
  })

  it('serves every declared item exactly once across the batches', async () => {
    const pages = await collect(driveOffsetBatch(plan, totalResponder(50), { headers: {} }))

    const items = pages.flatMap(page => {
      const data: unknown = page.data
      return isRecord(data) && Array.isArray(data.items) ? data.items : []
    })
    expect(items).toEqual(Array.from({ length: 50 }, (_, position) => position))
  })

  it('marks batches below the declared total as announced', async () => {
    const empty = await collect(driveOffsetBatch(plan, totalResponder(0), { headers: {} }))
    const full = await collect(driveOffsetBatch(plan, totalResponder(50), { headers: {} }))

    expect(empty.map(page => page.expectListings)).toEqual([false])
    expect(full.map(page => page.expectListings)).toEqual([true, true, true])
  })

  it('sends the batch size as the limit alongside the template query', async () => {
    const fetcher = totalResponder(30)

    await collect(driveOffsetBatch(plan, fetcher, { headers: {} }))

    expect(fetcher.urls()).toEqual([
      'https://shop.example.az/api/products?category=plansetler&offset=0&limit=24',
      'https://shop.example.az/api/products?category=plansetler&offset=24&limit=24',
    ])
  })

  it('posts the offset as a form field', async () => {
    const formPlan: OffsetBatchPlan = {
      strategy: 'offset-batch',
      format: 'json',
      request: { url: 'https://shop.example.az/ajax.php', form: { action: 'loadProducts', limit: 15 } },
      batchSize: 15,
      offset: { in: 'form', name: 'offset' },
      total: { kind: 'json', path: 'totalCount' },
    }
    const fetcher = new RoutedFetcher(() => ({ body: '{"totalCount":20,"html":""}' }))

    await collect(driveOffsetBatch(formPlan, fetcher, { headers: {} }))

    expect(fetcher.requests.map(request => request.body)).toEqual([
      'action=loadProducts&limit=15&offset=0',
      'action=loadProducts&limit=15&offset=15',
    ])
  })

  it('fails the source when the first batch has no total', async () => {
    const fetcher = new RoutedFetcher(() => ({ body: '{"items":[]}' }))

    const { items, error } = await collectUntilError(driveOffsetBatch(plan, fetcher, { headers: {} }))

    expect(items).toEqual([])
    expect(error).toBeInstanceOf(SchemaDriftError)
    expect(fetcher.requests).toHaveLength(1)
  })
})
