import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { extractRecords } from '../../../kit/extract.js'
import { createStrategy } from '../../../pagination/index.js'
import { collect, queryParam, RoutedFetcher } from '../../../pagination/__tests__/routed-fetcher.js'
import { manifest } from '../manifest.js'

function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8')
}

const FIRST_BATCH = readFixture('offset-0.json')

function fetcher(first = FIRST_BATCH) {
  return new RoutedFetcher(request => {
    const offset = queryParam(request, 'offset') ?? '0'
    return { body: offset === '0' ? first : readFixture(`offset-${offset}.json`) }
  })
}

async function crawl(first: string) {
  const pages = await collect(createStrategy(manifest.pagination).drive(fetcher(first)))
  return pages.flatMap(
    page => extractRecords(page, manifest.records, { source: manifest.id, identity: manifest.identity }).records
  )
}

describe('mgstore contract', () => {
  it('requests offsets in batches up to the declared total', async () => {
    const source = fetcher()

    const pages = await collect(createStrategy(manifest.pagination).drive(source))

    expect(pages.map(page => page.offset)).toEqual([0, 24])
    expect(source.urls()).toEqual([
      'https://mgstore.az/api/catalog/products?category=plansetler&lang=az&offset=0&limit=24',
      'https://mgstore.az/api/catalog/products?category=plansetler&lang=az&offset=24&limit=24',
    ])
  })

  it('drops listings without a price and falls back to the regular price', async () => {
    const pages = await collect(createStrategy(manifest.pagination).drive(fetcher()))
    const results = pages.map(page =>
      extractRecords(page, manifest.records, { source: manifest.id, identity: manifest.identity })
    )

    expect(results.map(result => result.excluded)).toEqual([1, 0])
    expect(results.flatMap(result => result.records)).toEqual([
      {
        name: 'Xiaomi Pad 7 8/256GB',
        product_id: '5101',
        sku: 'XM-PAD7-256',
        brand: 'Xiaomi',
        price_current: 799,
        price_old: 899,
        discount_pct: 11,
        in_stock: true,
        url: 'https://mgstore.az/az/product/xiaomi-pad-7-8-256gb',
        image_url: 'https://mgstore.az/media/catalog/pad7.jpg',
        page: 1,
      },
      {
        name: 'Samsung Galaxy Tab S10 Ultra 12/256GB',
        product_id: '5140',
        sku: 'SM-X920',
        brand: 'Samsung',
        price_current: 2199,
        price_old: 2199,
        discount_pct: 0,
        in_stock: false,
        url: 'https://mgstore.az/az/product/samsung-galaxy-tab-s10-ultra-12-256gb',
        image_url: 'https://mgstore.az/media/catalog/s10-ultra.jpg',
        page: 2,
      },
    ])
  })

  it('raises schema drift when the id key is renamed', async () => {
    await expect(crawl(FIRST_BATCH.replace(/"id":/g, '"entityId":'))).rejects.toThrow(
      'Schema drift: required field is empty (source=mgstore, field=product_id, page=1)'
    )
  })

  it('raises schema drift when the product list moves under a declared total', async () => {
    await expect(crawl(FIRST_BATCH.replace('"products"', '"items"'))).rejects.toThrow(
      'Schema drift: no listings found on an announced page (source=mgstore, field=products, page=1)'
    )
  })
})
