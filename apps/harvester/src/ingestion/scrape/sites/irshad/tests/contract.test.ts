import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { extractRecords } from '../../../kit/extract.js'
import { resolveLastPage } from '../../../pagination/fixed-page-count.js'
import { createStrategy } from '../../../pagination/index.js'
import { collect, RoutedFetcher } from '../../../pagination/__tests__/routed-fetcher.js'
import type { RawPage } from '../../../types.js'
import { manifest } from '../manifest.js'

function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8')
}

const page: RawPage = {
  index: 1,
  url: 'https://irshad.az/az/telefon-ve-aksesuarlar/plansetler',
  format: 'html',
  body: readFixture('listing-page-1.html'),
}

/** Serve `body` for every page and extract the whole crawl */
async function crawl(body: string) {
  const pages = await collect(createStrategy(manifest.pagination).drive(new RoutedFetcher(() => ({ body }))))
  return pages.flatMap(
    served => extractRecords(served, manifest.records, { source: manifest.id, identity: manifest.identity }).records
  )
}

describe('irshad contract', () => {
  it('reads the last page from the pagination links', () => {
    const plan = manifest.pagination
    if (plan.strategy !== 'fixed-page-count') throw new Error('expected a fixed page count plan')
    expect(resolveLastPage(plan.lastPage, page)).toBe(5)
  })

  it('extracts listing cards', () => {
    const result = extractRecords(page, manifest.records, { source: manifest.id, identity: manifest.identity })

    expect(result.records).toEqual([
      {
        name: 'Samsung Galaxy Tab S9 8/128GB',
        code: '210455',
        price_current: 1699.99,
        price_old: 1899.99,
        availability: true,
        product_type: 'Planşet',
        url: 'https://irshad.az/az/mehsullar/samsung-galaxy-tab-s9-8-128gb',
        image_url: 'https://irshad.az/uploads/products/tab-s9.webp',
        page: 1,
      },
      {
        name: 'Xiaomi Pad 6 8/256GB',
        code: '210777',
        price_current: 899,
        price_old: null,
        availability: false,
        product_type: null,
        url: 'https://irshad.az/az/mehsullar/xiaomi-pad-6-8-256gb',
        image_url: 'https://irshad.az/uploads/products/pad-6.webp',
        page: 1,
      },
    ])
  })

  it('raises schema drift when the name class changes', async () => {
    const drifted = page.body.replace(/product__name/g, 'product-title')

    await expect(crawl(drifted)).rejects.toThrow('Schema drift: required field is empty (source=irshad, field=name, page=1)')
  })

  it('raises schema drift when the product list is renamed', async () => {
    const drifted = page.body.replace('class="products"', 'class="catalog"')

    await expect(crawl(drifted)).rejects.toThrow(
      'Schema drift: no listings found on an announced page (source=irshad, field=.products .product, page=1)'
    )
  })
})
