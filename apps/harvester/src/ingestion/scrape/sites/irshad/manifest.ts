import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'irshad',
  label: 'irshad.az',
  version: '1.0.0',
  baseUrls: ['https://irshad.az'],
  identity: { productId: 'code', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://irshad.az/az/telefon-ve-aksesuarlar/plansetler' },
    page: { in: 'query', name: 'page', firstPageBare: true },
    lastPage: [{ kind: 'links', selector: '.pagination a[href]', pattern: '[?&]page=(\\d+)' }],
  },
  records: {
    source: { kind: 'html', itemSelector: '.products .product' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'text', selector: '.product__name' }] },
      {
        field: 'code',
        rules: [
          { kind: 'attr', attr: 'data-code' },
          { kind: 'text', selector: '.product__code', match: { pattern: '(\\d+)' } },
        ],
      },
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '.product__price .new-price' }], clean: 'price' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.product__price .old-price' }], clean: 'price' },
      { field: 'availability', rules: [{ kind: 'text', selector: '.product__stock' }], clean: 'stock' },
      { field: 'product_type', rules: [{ kind: 'text', selector: '.product__type' }] },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a.product__name[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      {
        field: 'image_url',
        rules: [
          { kind: 'attr', selector: '.product__img img', attr: 'data-src', transforms: ['absoluteUrl'] },
          { kind: 'attr', selector: '.product__img img', attr: 'src', transforms: ['absoluteUrl'] },
        ],
      },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: { code: 'product_id', availability: 'in_stock', product_type: 'category' },
}
