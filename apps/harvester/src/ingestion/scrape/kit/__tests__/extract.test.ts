import { createLogger, createMemorySink } from '@pricegrid/logger'
import { describe, expect, it } from 'vitest'
import { IdentityMissingError, SchemaDriftError } from '../../../../scraper/errors.js'
import type { RawPage, RecordMapping } from '../../types.js'
import { extractRecords, identityKeyOf, resolveIdentity } from '../extract.js'

const identity = { productId: 'id', url: 'url' }

function htmlPage(body: string, index = 1): RawPage {
  return { index, url: `https://shop.example.az/catalog?page=${index}`, format: 'html', body }
}

function jsonPage(data: unknown, index = 1): RawPage {
  return { index, url: 'https://shop.example.az/api/list', format: 'json', body: JSON.stringify(data) }
}

const LISTING = `
<div class="list">
  <div class="card" data-id="101">
    <a class="title" href="/p/tab-a?utm=x"> Tab   A </a>
    <span class="price">1.299,50 ₼</span>
    <span class="label">Yeni</span><span class="label">-10 %</span>
    <span class="stock">Stokda var</span>
    <span class="new-badge"></span>
  </div>
  <div class="card" data-id="0">
    <a class="title" href="/p/tab-b">Tab B</a>
    <span class="price">959.00</span>
  </div>
  <div class="card"><span class="price">100</span></div>
</div>`

const htmlMapping: RecordMapping = {
  source: { kind: 'html', itemSelector: '.card' },
  fields: [
    { field: 'id', rules: [{ kind: 'attr', attr: 'data-id', nonZero: true }] },
    { field: 'name', rules: [{ kind: 'text', selector: '.title' }], clean: 'text' },
    { field: 'price', rules: [{ kind: 'text', selector: '.price' }], clean: 'price' },
    { field: 'labels', rules: [{ kind: 'texts', selector: '.label' }] },
    { field: 'discount', rules: [{ kind: 'text', selector: '.label', withText: '\\d\\s*%' }], clean: 'percent' },
    { field: 'in_stock', rules: [{ kind: 'text', selector: '.stock' }], clean: 'stock' },
    { field: 'is_new', rules: [{ kind: 'exists', selector: '.new-badge' }] },
    {
      field: 'url',
      rules: [{ kind: 'attr', selector: 'a.title', attr: 'href', transforms: ['absoluteUrl', 'stripQuery'] }],
    },
    { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
  ],
}

describe('extractRecords (html)', () => {
  it('evaluates rule chains, cleaners and transforms per item', () => {
    const result = extractRecords(htmlPage(LISTING, 2), htmlMapping, { source: 'test', identity })

    expect(result.records).toEqual([
      {
        id: '101',
        name: 'Tab A',
        price: 1299.5,
        labels: 'Yeni; -10 %',
        discount: 10,
        in_stock: true,
        is_new: true,
        url: 'https://shop.example.az/p/tab-a',
        page: 2,
      },
      {
        id: null,
        name: 'Tab B',
        price: 959,
        labels: null,
        discount: null,
        in_stock: null,
        is_new: false,
        url: 'https://shop.example.az/p/tab-b',
        page: 2,
      },
    ])
  })

  it('skips listings without identity and logs them', () => {
    const sink = createMemorySink()
    const log = createLogger('test', { level: 'warn', sink })

    const result = extractRecords(htmlPage(LISTING), htmlMapping, { source: 'test', identity, log })

    expect(result.skipped).toBe(1)
    expect(sink.entries).toHaveLength(1)
    expect(sink.entries[0]).toMatchObject({ message: 'Record skipped', source: 'test', page: 1, position: 2 })
  })

  it('raises schema drift when a required field is empty', () => {
    const mapping: RecordMapping = {
      ...htmlMapping,
      fields: htmlMapping.fields.map(field => (field.field === 'in_stock' ? { ...field, required: true } : field)),
    }

    let caught: unknown
    try {
      extractRecords(htmlPage(LISTING, 3), mapping, { source: 'test', identity })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(SchemaDriftError)
    if (!(caught instanceof SchemaDriftError)) return
    expect(caught.field).toBe('in_stock')
    expect(caught.page).toBe(3)
    expect(caught.source).toBe('test')
  })

  it('returns no records for a page without items', () => {
    const result = extractRecords(htmlPage('<p>Heç nə tapılmadı</p>'), htmlMapping, { source: 'test', identity })
    expect(result).toEqual({ records: [], skipped: 0, excluded: 0 })
  })

  it('raises schema drift when an announced page has no items', () => {
    const page: RawPage = { ...htmlPage('<div class="list"><div class="tile"></div></div>', 2), expectListings: true }

    expect(() => extractRecords(page, htmlMapping, { source: 'test', identity })).toThrow(
      'Schema drift: no listings found on an announced page (source=test, field=.card, page=2)'
    )
  })
})

describe('extractRecords (json)', () => {
  const mapping: RecordMapping = {
    source: { kind: 'json', itemsPath: 'data.items' },
    excludeWhenMissing: ['price'],
    fields: [
      { field: 'id', rules: [{ kind: 'json', path: 'id' }] },
      {
        field: 'price',
        rules: [
          { kind: 'json', path: 'special', nonZero: true },
          { kind: 'json', path: 'price' },
        ],
        clean: 'price',
      },
      { field: 'term', rules: [{ kind: 'json', path: 'credit.months', match: { pattern: '(\\d+)', template: '$1 ay' } }] },
      { field: 'tags', rules: [{ kind: 'jsonList', path: 'tags', itemPath: 'title' }] },
      { field: 'url', rules: [{ kind: 'json', path: 'slug', prefix: 'https://shop.example.az/p/' }] },
    ],
  }

  it('reads values by path and excludes listings without a price', () => {
    const page = jsonPage({
      data: {
        items: [
          { id: 7, slug: 'a', special: 0, price: '1.899,99', credit: { months: 12 }, tags: [{ title: 'Endirim' }, { title: ' ' }] },
          { id: 8, slug: 'b', special: null, price: null },
          { id: 9, slug: 'c', special: '349', price: '400', tags: [] },
        ],
      },
    })

    const result = extractRecords(page, mapping, { source: 'test', identity })

    expect(result.excluded).toBe(1)
    expect(result.records).toEqual([
      { id: 7, price: 1899.99, term: '12 ay', tags: 'Endirim', url: 'https://shop.example.az/p/a' },
      { id: 9, price: 349, term: null, tags: null, url: 'https://shop.example.az/p/c' },
    ])
  })

  it('treats a null item list as an empty page', () => {
    const result = extractRecords(jsonPage({ data: { items: null } }), mapping, { source: 'test', identity })
    expect(result.records).toEqual([])
  })

  it('raises schema drift when the item path is gone from an announced page', () => {
    const page: RawPage = { ...jsonPage({ data: { products: [{ id: 1 }] } }, 3), expectListings: true }

    expect(() => extractRecords(page, mapping, { source: 'test', identity })).toThrow(
      'Schema drift: no listings found on an announced page (source=test, field=data.items, page=3)'
    )
  })

  it('raises schema drift when the item path is not a list', () => {
    expect(() => extractRecords(jsonPage({ data: { items: {} } }), mapping, { source: 'test', identity })).toThrow(
      'Schema drift: items path does not resolve to a list (source=test, field=data.items, page=1)'
    )
  })

  it('raises schema drift for a body that is not JSON', () => {
    const page: RawPage = { index: 4, url: 'https://shop.example.az/api/list', format: 'json', body: '<html>' }
    expect(() => extractRecords(page, mapping, { source: 'test', identity })).toThrow(SchemaDriftError)
  })

  it('extracts from an HTML fragment inside a JSON response', () => {
    const fragmentMapping: RecordMapping = {
      source: { kind: 'json-html', htmlPath: 'html', itemSelector: '.item' },
      fields: [
        { field: 'id', rules: [{ kind: 'attr', attr: 'data-id' }] },
        { field: 'url', rules: [{ kind: 'attr', selector: 'a', attr: 'href', transforms: ['absoluteUrl'] }] },
      ],
    }
    const page = jsonPage({ html: '<div class="item" data-id="x1"><a href="/p/x1">X1</a></div>' })

    const result = extractRecords(page, fragmentMapping, { source: 'test', identity })

    expect(result.records).toEqual([{ id: 'x1', url: 'https://shop.example.az/p/x1' }])
  })
})

describe('identity', () => {
  it('prefers the product id and falls back to the URL', () => {
    expect(identityKeyOf({ id: 42, url: 'https://a.az/p' }, identity)).toBe('42')
    expect(identityKeyOf({ id: null, url: ' https://a.az/p ' }, identity)).toBe('https://a.az/p')
    expect(identityKeyOf({ id: '', url: null }, identity)).toBeUndefined()
  })

  it('throws IdentityMissingError without a key', () => {
    expect(() => resolveIdentity({ id: null, url: null }, identity, 5)).toThrow(IdentityMissingError)
    expect(() => resolveIdentity({ id: null, url: null }, identity, 5)).toThrow('Record on page 5 has no identity key')
  })
})
