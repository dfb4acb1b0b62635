import type { SourceManifest } from '../../types.js'

export const manifest: SourceManifest = {
  id: 'birmarket',
  label: 'birmarket.az',
  version: '1.0.0',
  baseUrls: ['https://birmarket.az'],
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://birmarket.az/categories/17-planshetler' },
    page: { in: 'query', name: 'page', firstPageBare: true },
    lastPage: [{ kind: 'links', selector: '.MPProductPagination-PageItem a[href]', pattern: '[?&]page=(\\d+)' }],
  },
  records: {
    source: { kind: 'html', itemSelector: '.MPProductItem' },
    fields: [
      {
        field: 'name',
        required: true,
        rules: [
          { kind: 'text', selector: '.MPTitle' },
          { kind: 'attr', selector: 'a[href]', attr: 'title' },
        ],
      },
      { field: 'product_id', required: true, rules: [{ kind: 'attr', attr: 'data-product-id' }] },
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '[data-info="item-desc-price-new"]' }], clean: 'price' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '[data-info="item-desc-price-old"]' }], clean: 'price' },
      { field: 'discount_pct', rules: [{ kind: 'text', selector: '.MPProductItem-Discount' }], clean: 'percent' },
      {
        field: 'installment_monthly',
        rules: [
          {
            kind: 'text',
            selector: '.MPInstallment',
            match: { pattern: '([\\d.,]+)\\s*[₼₽$]?\\s*[xX×]\\s*(\\d+)\\s*ay', group: 1 },
          },
        ],
        clean: 'price',
      },
      {
        field: 'installment_term',
        rules: [
          {
            kind: 'text',
            selector: '.MPInstallment',
            match: { pattern: '([\\d.,]+)\\s*[₼₽$]?\\s*[xX×]\\s*(\\d+)\\s*ay', template: '$2 ay' },
          },
        ],
      },
      { field: 'url', rules: [{ kind: 'attr', selector: 'a[href]', attr: 'href', transforms: ['absoluteUrl'] }] },
      {
        field: 'image_url',
        rules: [
          { kind: 'attr', selector: 'picture source[srcset]', attr: 'srcset', pick: 'last', transforms: ['stripQuery'] },
          { kind: 'attr', selector: 'img', attr: 'src', transforms: ['stripQuery'] },
        ],
      },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: {},
}
