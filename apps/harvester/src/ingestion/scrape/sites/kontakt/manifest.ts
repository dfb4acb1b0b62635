import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'kontakt',
  label: 'kontakt.az',
  version: '1.0.0',
  baseUrls: ['https://kontakt.az'],
  // Listings expose no stable product id outside the analytics payload
  identity: { url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://kontakt.az/plansetler-ve-elektron-kitablar/plansetler' },
    page: { in: 'query', name: 'p' },
    lastPage: [
      { kind: 'count', selector: '.catalog__count', pageSize: 20 },
      { kind: 'links', selector: "a[href*='?p='], a[href*='&p=']", pattern: '[?&]p=(\\d+)' },
    ],
  },
  records: {
    source: { kind: 'html', itemSelector: '.product-item' },
    fields: [
      {
        field: 'name',
        required: true,
        rules: [
          { kind: 'attrJson', attr: 'data-gtm', path: 'item_name' },
          { kind: 'text', selector: '.prodItem__title' },
        ],
        clean: 'text',
      },
      { field: 'brand', rules: [{ kind: 'attrJson', attr: 'data-gtm', path: 'item_brand' }], clean: 'text' },
      {
        field: 'sku',
        rules: [
          { kind: 'attrJson', attr: 'data-gtm', path: 'item_id' },
          { kind: 'attr', attr: 'data-sku' },
        ],
        clean: 'text',
      },
      {
        field: 'price_current',
        required: true,
        rules: [
          { kind: 'attrJson', attr: 'data-gtm', path: 'price' },
          { kind: 'text', selector: '.prodItem__prices b' },
        ],
        clean: 'price',
      },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.prodItem__prices i' }], clean: 'price' },
      {
        field: 'discount_pct',
        rules: [
          {
            kind: 'text',
            selector: ".prodItem__img .label-image-wrapper, [class*='discount'], [class*='label']",
            withText: '\\d\\s*%',
            match: { pattern: '-?\\d+\\s*%' },
          },
        ],
        clean: 'percent',
      },
      { field: 'discount_amount', rules: [{ kind: 'attrJson', attr: 'data-gtm', path: 'discount' }], clean: 'price' },
      { field: 'installment', rules: [{ kind: 'text', selector: '.prodItem__prices span' }] },
      { field: 'category', rules: [{ kind: 'attrJson', attr: 'data-gtm', path: 'item_category' }], clean: 'text' },
      {
        field: 'url',
        rules: [
          {
            kind: 'attr',
            selector: 'a[href]:not([href*="compare"]):not([href*="wishlist"]):not([href*="cart"]):not([href="#"])',
            attr: 'href',
            transforms: ['absoluteUrl'],
          },
        ],
      },
      {
        field: 'image_url',
        rules: [
          { kind: 'attr', selector: 'img[src*="media/catalog"]', attr: 'src', transforms: ['absoluteUrl'] },
          { kind: 'attr', selector: 'img[data-src]', attr: 'data-src', transforms: ['absoluteUrl'] },
        ],
      },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: {},
}
