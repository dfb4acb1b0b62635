import type { SourceManifest } from '../../types.js'

const LISTING_URL = 'https://www.bakuelectronics.az/az/catalog/telefonlar-qadcetler/plansetler'

export const manifest: SourceManifest = {
  id: 'bakuelectronics',
  label: 'bakuelectronics.az',
  version: '1.0.0',
  baseUrls: ['https://www.bakuelectronics.az'],
  headers: {
    Referer: LISTING_URL,
    'Sec-Fetch-Site': 'same-origin',
  },
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'build-id',
    bootstrap: {
      url: LISTING_URL,
      headers: { Accept: 'text/html,application/xhtml+xml,*/*;q=0.8' },
    },
    pattern: '"buildId":"([^"]+)"',
    initialData: { selector: 'script#__NEXT_DATA__', path: 'props' },
    then: {
      strategy: 'fixed-page-count',
      format: 'json',
      request: {
        url: 'https://www.bakuelectronics.az/_next/data/{buildId}/az/catalog/telefonlar-qadcetler/plansetler.json',
        query: { slug: ['telefonlar-qadcetler', 'plansetler'] },
        headers: { Accept: '*/*', 'x-nextjs-data': '1' },
      },
      page: { in: 'query', name: 'page' },
      lastPage: [
        {
          kind: 'json',
          totalPath: 'pageProps.products.products.total',
          pageSizePath: 'pageProps.products.products.size',
          pageSize: 18,
        },
      ],
    },
  },
  records: {
    source: { kind: 'json', itemsPath: 'pageProps.products.products.items' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'json', path: 'name' }], clean: 'text' },
      { field: 'product_id', required: true, rules: [{ kind: 'json', path: 'id' }], clean: 'text' },
      { field: 'sku', rules: [{ kind: 'json', path: 'product_code' }], clean: 'text' },
      {
        field: 'price_current',
        required: true,
        rules: [
          { kind: 'json', path: 'discounted_price', nonZero: true },
          { kind: 'json', path: 'price' },
        ],
        clean: 'price',
      },
      { field: 'price_old', rules: [{ kind: 'json', path: 'price' }], clean: 'price' },
      { field: 'discount_amount', rules: [{ kind: 'json', path: 'discount' }], clean: 'price' },
      { field: 'installment_monthly', rules: [{ kind: 'json', path: 'perMonth.price' }], clean: 'price' },
      {
        field: 'installment_term',
        rules: [{ kind: 'json', path: 'perMonth.month', match: { pattern: '(\\d+)', template: '$1 ay' } }],
      },
      { field: 'quantity', rules: [{ kind: 'json', path: 'quantity' }], clean: 'integer' },
      { field: 'review_count', rules: [{ kind: 'json', path: 'reviewCount' }], clean: 'integer' },
      { field: 'rating', rules: [{ kind: 'json', path: 'rate' }], clean: 'number' },
      { field: 'is_online', rules: [{ kind: 'json', path: 'is_online' }], clean: 'flag' },
      { field: 'campaign', rules: [{ kind: 'jsonList', path: 'campaign_widgets', itemPath: 'title' }] },
      {
        field: 'url',
        rules: [{ kind: 'json', path: 'slug', prefix: 'https://www.bakuelectronics.az/az/mehsullar/' }],
      },
      { field: 'image_url', rules: [{ kind: 'json', path: 'image' }] },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: { campaign: 'special_offer' },
}
