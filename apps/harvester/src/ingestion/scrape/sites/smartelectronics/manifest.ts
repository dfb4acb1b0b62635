import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'smartelectronics',
  label: 'smartelectronics.az',
  version: '1.0.0',
  baseUrls: ['https://smartelectronics.az'],
  headers: {
    Referer: 'https://smartelectronics.az/az/smartfon-ve-aksesuarlar/plansetler',
    'Sec-Fetch-Site': 'same-origin',
  },
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'chained-cursor',
    format: 'html',
    request: {
      url: 'https://smartelectronics.az/az/Catalog/Products/LoadMoreVr/smartfon-ve-aksesuarlar/plansetler',
      query: { pageSize: 9 },
    },
    // The fragment carries <div class="shw_more" hidden>True</div> while more pages exist
    cursor: { kind: 'counter', param: { in: 'query', name: 'pageIndex' }, start: 0 },
    hasMore: { kind: 'selector', selector: '.shw_more', equals: 'true' },
    stopOnEmpty: { kind: 'selector', selector: '.product_card' },
  },
  records: {
    source: { kind: 'html', itemSelector: '.product_card' },
    fields: [
      {
        field: 'name',
        required: true,
        rules: [
          { kind: 'text', selector: '.product_title p' },
          { kind: 'attr', selector: '[data-product-name]', attr: 'data-product-name' },
        ],
      },
      {
        field: 'product_id',
        required: true,
        rules: [
          { kind: 'attr', selector: 'a.add-to-compare[href]', attr: 'href', match: { pattern: '/(\\d+)$' } },
          { kind: 'attr', selector: '.product_price p[data-id]', attr: 'data-id' },
        ],
      },
      { field: 'category', rules: [{ kind: 'text', selector: '.product_title span' }] },
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '.product_price p' }], clean: 'price' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.product_price span' }], clean: 'price' },
      { field: 'installment_monthly', rules: [{ kind: 'text', selector: '.product_credit p[data-target]' }], clean: 'price' },
      { field: 'installment_term', rules: [{ kind: 'text', selector: '.product_credit .product__credit_list_item.active' }] },
      {
        field: 'in_stock',
        rules: [{ kind: 'attr', selector: '[data-product-out-of-stock]', attr: 'data-product-out-of-stock' }],
        clean: 'outOfStockFlag',
      },
      { field: 'promo_labels', rules: [{ kind: 'texts', selector: '.product_percent .swiper-slide' }] },
      { field: 'url', rules: [{ kind: 'attr', selector: '.product_img > a[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      { field: 'image_url', rules: [{ kind: 'attr', selector: '.product_img img', attr: 'src' }] },
      { field: 'page', rules: [{ kind: 'page', value: 'offset' }] },
    ],
  },
  renames: { promo_labels: 'special_offer' },
}
