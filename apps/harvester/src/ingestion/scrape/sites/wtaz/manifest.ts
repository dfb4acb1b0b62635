import type { FieldMapping, SourceManifest } from '../../types.js'

function installment(months: number): FieldMapping {
  return {
    field: `installment_${months}m`,
    rules: [{ kind: 'attr', selector: 'label.month[data-price]', attr: 'data-price', withText: `(^|\\D)${months}\\s*ay` }],
    clean: 'price',
  }
}

export const manifest: SourceManifest = {
  id: 'wtaz',
  label: 'w-t.az',
  version: '1.0.0',
  baseUrls: ['https://www.w-t.az'],
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://www.w-t.az/k3+plansetler' },
    page: { in: 'query', name: 'page', firstPageBare: true },
    // The category renders every listing on one page
    lastPage: [],
  },
  records: {
    source: { kind: 'html', itemSelector: '.filterProducts .item .productCard' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'text', selector: '.productName' }] },
      { field: 'product_id', required: true, rules: [{ kind: 'attr', selector: 'button.addToFavourite[data-id]', attr: 'data-id' }] },
      { field: 'price', required: true, rules: [{ kind: 'text', selector: '.realPrice' }], clean: 'price' },
      installment(6),
      installment(12),
      installment(18),
      {
        field: 'installment_active_term',
        rules: [{ kind: 'text', selector: 'label.month.checked', match: { pattern: '(\\d+)\\s*ay', template: '$1 ay' } }],
      },
      {
        field: 'installment_active_price',
        rules: [{ kind: 'attr', selector: 'label.month.checked', attr: 'data-price' }],
        clean: 'price',
      },
      { field: 'campaign', rules: [{ kind: 'texts', selector: '.cashCampaign p, .labels p' }] },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a.productUrl[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      { field: 'image_url', rules: [{ kind: 'attr', selector: '.productImage-img', attr: 'src' }] },
    ],
  },
  renames: { price: 'price_current', campaign: 'special_offer' },
}
