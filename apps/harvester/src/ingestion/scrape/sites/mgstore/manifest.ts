import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'mgstore',
  label: 'mgstore.az',
  version: '1.0.0',
  baseUrls: ['https://mgstore.az'],
  headers: { Accept: 'application/json' },
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'offset-batch',
    format: 'json',
    request: {
      url: 'https://mgstore.az/api/catalog/products',
      query: { category: 'plansetler', lang: 'az' },
    },
    batchSize: 24,
    offset: { in: 'query', name: 'offset' },
    limit: { in: 'query', name: 'limit' },
    total: { kind: 'json', path: 'total' },
  },
  records: {
    source: { kind: 'json', itemsPath: 'products' },
    // Listings without a price are announcements of upcoming models
    excludeWhenMissing: ['price_current'],
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'json', path: 'name' }], clean: 'text' },
      { field: 'product_id', required: true, rules: [{ kind: 'json', path: 'id' }], clean: 'text' },
      { field: 'sku', rules: [{ kind: 'json', path: 'sku' }], clean: 'text' },
      { field: 'brand', rules: [{ kind: 'json', path: 'brand.name' }], clean: 'text' },
      {
        field: 'price_current',
        rules: [
          { kind: 'json', path: 'special_price', nonZero: true },
          { kind: 'json', path: 'price', nonZero: true },
        ],
        clean: 'price',
      },
      { field: 'price_old', rules: [{ kind: 'json', path: 'price' }], clean: 'price' },
      { field: 'discount_pct', rules: [{ kind: 'json', path: 'discount_percent' }], clean: 'percent' },
      { field: 'in_stock', rules: [{ kind: 'json', path: 'stock_status' }], clean: 'stock' },
      { field: 'url', rules: [{ kind: 'json', path: 'url_key', prefix: 'https://mgstore.az/az/product/' }] },
      { field: 'image_url', rules: [{ kind: 'json', path: 'image', transforms: ['absoluteUrl'] }] },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: {},
}
