/**
 * Canonical dataset schema
 *
 * The master dataset's column set is the union of every source's fields
 * after renaming. Column order here is the header order of data.csv.
 */

export const CANONICAL_COLUMNS = [
  'source',
  'name',
  'product_id',
  'sku',
  'brand',
  'category',
  'price_current',
  'price_old',
  'discount_pct',
  'discount_amount',
  'installment_6m',
  'installment_12m',
  'installment_18m',
  'installment_monthly',
  'installment_term',
  'installment',
  'installment_active_term',
  'installment_active_price',
  'in_stock',
  'is_new',
  'is_online',
  'quantity',
  'review_count',
  'rating',
  'special_offer',
  'region',
  'updated_at',
  'status',
  'kinds',
  'shop_id',
  'url',
  'image_url',
  'page',
] as const

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number]

export type CanonicalValue = string | number | boolean | null

export type CanonicalRecord = Record<CanonicalColumn, CanonicalValue>

export const NUMERIC_COLUMNS: ReadonlySet<CanonicalColumn> = new Set<CanonicalColumn>([
  'price_current',
  'price_old',
  'discount_pct',
  'discount_amount',
  'installment_6m',
  'installment_12m',
  'installment_18m',
  'installment_monthly',
  'installment_active_price',
  'quantity',
  'review_count',
  'rating',
  'page',
])

/** Money columns; negative values are parse failures, not data */
export const PRICE_COLUMNS: ReadonlySet<CanonicalColumn> = new Set<CanonicalColumn>([
  'price_current',
  'price_old',
  'discount_amount',
  'installment_6m',
  'installment_12m',
  'installment_18m',
  'installment_monthly',
  'installment_active_price',
])

/** true / false / unknown (null) */
export const TRI_STATE_COLUMNS: ReadonlySet<CanonicalColumn> = new Set<CanonicalColumn>(['in_stock', 'is_new', 'is_online'])

export function isCanonicalColumn(value: string): value is CanonicalColumn {
  return CANONICAL_COLUMNS.some(column => column === value)
}

/** Every column present, all empty except `source` */
export function emptyCanonicalRecord(source: string): CanonicalRecord {
  return fill({ source })
}

function fill(partial: Partial<CanonicalRecord>): CanonicalRecord {
  return {
    source: partial.source ?? null,
    name: partial.name ?? null,
    product_id: partial.product_id ?? null,
    sku: partial.sku ?? null,
    brand: partial.brand ?? null,
    category: partial.category ?? null,
    price_current: partial.price_current ?? null,
    price_old: partial.price_old ?? null,
    discount_pct: partial.discount_pct ?? null,
    discount_amount: partial.discount_amount ?? null,
    installment_6m: partial.installment_6m ?? null,
    installment_12m: partial.installment_12m ?? null,
    installment_18m: partial.installment_18m ?? null,
    installment_monthly: partial.installment_monthly ?? null,
    installment_term: partial.installment_term ?? null,
    installment: partial.installment ?? null,
    installment_active_term: partial.installment_active_term ?? null,
    installment_active_price: partial.installment_active_price ?? null,
    in_stock: partial.in_stock ?? null,
    is_new: partial.is_new ?? null,
    is_online: partial.is_online ?? null,
    quantity: partial.quantity ?? null,
    review_count: partial.review_count ?? null,
    rating: partial.rating ?? null,
    special_offer: partial.special_offer ?? null,
    region: partial.region ?? null,
    updated_at: partial.updated_at ?? null,
    status: partial.status ?? null,
    kinds: partial.kinds ?? null,
    shop_id: partial.shop_id ?? null,
    url: partial.url ?? null,
    image_url: partial.image_url ?? null,
    page: partial.page ?? null,
  }
}
