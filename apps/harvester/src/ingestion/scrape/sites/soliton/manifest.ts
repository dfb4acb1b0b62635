import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'soliton',
  label: 'soliton.az',
  version: '1.0.0',
  baseUrls: ['https://soliton.az'],
  headers: {
    'X-Requested-With': 'XMLHttpRequest',
    Referer: 'https://soliton.az/az/komputer-ve-aksesuarlar/planshetler/',
  },
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'offset-batch',
    format: 'json',
    request: {
      url: 'https://soliton.az/ajax-requests.php',
      method: 'POST',
      form: { action: 'loadProducts', sectionID: 'planshetler', brandID: '0', limit: 15 },
    },
    batchSize: 15,
    offset: { in: 'form', name: 'offset' },
    total: { kind: 'json', path: 'totalCount' },
  },
  records: {
    source: { kind: 'json-html', htmlPath: 'html', itemSelector: '.product-item' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'text', selector: '.prod-title' }] },
      { field: 'product_id', required: true, rules: [{ kind: 'attr', attr: 'data-id' }] },
      { field: 'brand_id', rules: [{ kind: 'attr', attr: 'data-brandid' }] },
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '.prices .new-price' }], clean: 'price' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.prices .old-price' }], clean: 'price' },
      { field: 'discount_pct', rules: [{ kind: 'text', selector: '.discount-label', match: { pattern: '-?\\d+\\s*%' } }], clean: 'percent' },
      {
        field: 'installment_monthly',
        rules: [{ kind: 'text', selector: '.monthly-payment', match: { pattern: '([\\d.,]+)' } }],
        clean: 'price',
      },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a.thumbHolder[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      { field: 'image_url', rules: [{ kind: 'attr', selector: 'a.thumbHolder img', attr: 'src', transforms: ['absoluteUrl'] }] },
      { field: 'offset', rules: [{ kind: 'page', value: 'offset' }] },
    ],
  },
  renames: { brand_id: 'brand', offset: 'page' },
}
