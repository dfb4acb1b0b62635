import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'texnohome',
  label: 'texnohome.az',
  version: '1.0.0',
  baseUrls: ['https://texnohome.az'],
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://texnohome.az/az/plansetler' },
    page: { in: 'query', name: 'page' },
    lastPage: [{ kind: 'labels', selector: '.pagination .page-item .page-link' }],
  },
  records: {
    source: { kind: 'html', itemSelector: '.product-list .product-card' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'text', selector: '.product-card__title' }] },
      {
        field: 'product_id',
        required: true,
        rules: [
          { kind: 'attr', attr: 'data-product-id' },
          { kind: 'attr', selector: '[data-product-id]', attr: 'data-product-id' },
        ],
      },
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '.product-card__price--new' }], clean: 'price' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.product-card__price--old' }], clean: 'price' },
      { field: 'labels', rules: [{ kind: 'texts', selector: '.product-card__labels span' }] },
      { field: 'in_stock', rules: [{ kind: 'text', selector: '.product-card__stock' }], clean: 'stock' },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a.product-card__link[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      { field: 'image_url', rules: [{ kind: 'attr', selector: '.product-card__image img', attr: 'src', transforms: ['absoluteUrl'] }] },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: { labels: 'special_offer' },
}
