import type { SourceManifest } from '../../types.js'

// Livewire renders the wishlist toggle as wire:click="toggleWishlist(<id>)"
const WISHLIST_ID = { pattern: 'toggleWishlist\\((\\d+)\\)' }

export const manifest: SourceManifest = {
  id: 'bytelecom',
  label: 'bytelecom.az',
  version: '1.0.0',
  baseUrls: ['https://bytelecom.az'],
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'fixed-page-count',
    format: 'html',
    request: { url: 'https://bytelecom.az/az/category/plansetler' },
    page: { in: 'query', name: 'page' },
    lastPage: [
      { kind: 'labels', selector: 'ul.pagination li button.page-link' },
      { kind: 'labels', selector: 'ul.pagination li.page-item' },
    ],
  },
  records: {
    source: { kind: 'html', itemSelector: '.categorised-products .product' },
    fields: [
      { field: 'name', required: true, rules: [{ kind: 'text', selector: 'a.product-name' }] },
      {
        field: 'product_id',
        required: true,
        rules: [
          { kind: 'attr', attr: 'wire:click', match: WISHLIST_ID },
          { kind: 'attr', selector: 'button.favourite-product', attr: 'wire:click', match: WISHLIST_ID },
        ],
      },
      // "749.00 ₼" or "₼ 2,499": a comma only groups thousands
      { field: 'price_current', required: true, rules: [{ kind: 'text', selector: '.prices h5.price' }], clean: 'commaGroupedPrice' },
      { field: 'price_old', rules: [{ kind: 'text', selector: '.prices h6.discount-price' }], clean: 'commaGroupedPrice' },
      { field: 'badges', rules: [{ kind: 'texts', selector: '.badge-item p' }] },
      { field: 'is_new', rules: [{ kind: 'exists', selector: '.new-product' }] },
      {
        field: 'url',
        rules: [
          { kind: 'attr', selector: 'a:has(.product-img)', attr: 'href', transforms: ['absoluteUrl'] },
          { kind: 'attr', selector: "a[href*='/az/products/']", attr: 'href', transforms: ['absoluteUrl'] },
        ],
      },
      { field: 'image_url', rules: [{ kind: 'attr', selector: '.product-img img', attr: 'src', transforms: ['absoluteUrl'] }] },
      { field: 'page', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: { badges: 'special_offer' },
}
