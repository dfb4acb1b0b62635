import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { extractRecords } from '../../../kit/extract.js'
import { createStrategy } from '../../../pagination/index.js'
import { collect, RoutedFetcher } from '../../../pagination/__tests__/routed-fetcher.js'
import type { RawPage } from '../../../types.js'
import { manifest } from '../manifest.js'

function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8')
}

const page: RawPage = {
  index: 1,
  url: 'https://www.w-t.az/k3+plansetler',
  format: 'html',
  body: readFixture('listing.html'),
}

async function crawl(body: string) {
  const pages = await collect(createStrategy(manifest.pagination).drive(new RoutedFetcher(() => ({ body }))))
  return pages.flatMap(
    served => extractRecords(served, manifest.records, { source: manifest.id, identity: manifest.identity }).records
  )
}

describe('wtaz contract', () => {
  it('fetches the single category page once', async () => {
    const fetcher = new RoutedFetcher(() => ({ body: page.body }))

    const pages = await collect(createStrategy(manifest.pagination).drive(fetcher))

    expect(pages).toHaveLength(1)
    expect(fetcher.urls()).toEqual(['https://www.w-t.az/k3+plansetler'])
  })

  it('reads each installment term by its label', () => {
    const result = extractRecords(page, manifest.records, { source: manifest.id, identity: manifest.identity })

    expect(result.records).toEqual([
      {
        name: 'Samsung Galaxy Tab A9+ 8/128GB',
        product_id: '30517',
        price: 529.99,
        installment_6m: 93.33,
        installment_12m: 48.58,
        installment_18m: 33.86,
        installment_active_term: '12 ay',
        installment_active_price: 48.58,
        campaign: 'Nağd alışda 5% endirim',
        url: 'https://www.w-t.az/samsung-galaxy-tab-a9-plus-8-128gb',
        image_url: 'https://www.w-t.az/uploads/tab-a9-plus.png',
      },
      {
        name: 'Lenovo Tab P12 8/128GB',
        product_id: '30544',
        price: 749,
        installment_6m: null,
        installment_12m: null,
        installment_18m: null,
        installment_active_term: null,
        installment_active_price: null,
        campaign: null,
        url: 'https://www.w-t.az/lenovo-tab-p12-8-128gb',
        image_url: 'https://www.w-t.az/uploads/tab-p12.png',
      },
    ])
  })

  it('raises schema drift when the price class changes', async () => {
    const drifted = page.body.replace(/realPrice/g, 'price-value')

    await expect(crawl(drifted)).rejects.toThrow('Schema drift: required field is empty (source=wtaz, field=price, page=1)')
  })

  it('treats the single category page as announced', async () => {
    const drifted = page.body.replace('filterProducts', 'productGrid')

    await expect(crawl(drifted)).rejects.toThrow(
      'Schema drift: no listings found on an announced page (source=wtaz, field=.filterProducts .item .productCard, page=1)'
    )
  })
})
