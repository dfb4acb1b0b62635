import type { SourceManifest } from '../../types.js'

const LISTING_URL = 'https://tap.az/elanlar/elektronika/plansetler'

const ADS_QUERY = `fragment AdBaseFields on Ad {
  id
  title
  price
  updatedAt
  region
  path
  kinds
  legacyResourceId
  isBookmarked
  shop { id __typename }
  photo { url __typename }
  status
  __typename
}

query GetAds_LATEST(
  $adKind: AdKindEnum, $orderType: AdOrderEnum, $keywords: String,
  $first: Int, $after: String, $source: SourceEnum!,
  $filters: AdFilterInput, $keywordsSource: KeywordSourceEnum,
  $sourceLink: String
) {
  ads(
    adKind: $adKind
    first: $first
    after: $after
    source: $source
    orderType: $orderType
    keywords: $keywords
    filters: $filters
    keywordsSource: $keywordsSource
    sourceLink: $sourceLink
  ) {
    nodes { ...AdBaseFields __typename }
    pageInfo { endCursor hasNextPage __typename }
    __typename
  }
}
`

export const manifest: SourceManifest = {
  id: 'tapaz',
  label: 'tap.az',
  version: '1.0.0',
  baseUrls: ['https://tap.az'],
  headers: {
    Accept: '*/*',
    Origin: 'https://tap.az',
    Referer: LISTING_URL,
    'Sec-Fetch-Site': 'same-origin',
  },
  rateLimit: { maxConcurrent: 2 },
  identity: { productId: 'product_id', url: 'url' },
  pagination: {
    strategy: 'chained-cursor',
    format: 'json',
    request: {
      url: 'https://tap.az/graphql',
      method: 'POST',
      json: {
        operationName: 'GetAds_LATEST',
        variables: {
          first: 36,
          filters: {
            categoryId: 'Z2lkOi8vdGFwL0NhdGVnb3J5LzYxNg',
            price: { from: null, to: null },
            regionId: null,
            propertyOptions: { collection: [], boolean: [], range: [] },
          },
          sourceLink: LISTING_URL,
          source: 'DESKTOP',
          after: null,
        },
        query: ADS_QUERY,
      },
    },
    cursor: { kind: 'token', param: { in: 'json', name: 'variables.after' }, nextPath: 'data.ads.pageInfo.endCursor' },
    hasMore: { kind: 'json', path: 'data.ads.pageInfo.hasNextPage' },
  },
  records: {
    source: { kind: 'json', itemsPath: 'data.ads.nodes' },
    fields: [
      { field: 'title', required: true, rules: [{ kind: 'json', path: 'title' }], clean: 'text' },
      { field: 'product_id', required: true, rules: [{ kind: 'json', path: 'legacyResourceId' }], clean: 'text' },
      { field: 'price', required: true, rules: [{ kind: 'json', path: 'price' }], clean: 'price' },
      { field: 'region', rules: [{ kind: 'json', path: 'region' }], clean: 'text' },
      { field: 'updated_at', rules: [{ kind: 'json', path: 'updatedAt' }] },
      { field: 'kinds', rules: [{ kind: 'jsonList', path: 'kinds', separator: ', ' }] },
      { field: 'status', rules: [{ kind: 'json', path: 'status' }] },
      { field: 'shop_id', rules: [{ kind: 'json', path: 'shop.id' }], clean: 'text' },
      { field: 'url', rules: [{ kind: 'json', path: 'path', transforms: ['absoluteUrl'] }] },
      { field: 'image_url', rules: [{ kind: 'json', path: 'photo.url' }] },
      { field: 'batch', rules: [{ kind: 'page', value: 'index' }] },
    ],
  },
  renames: { title: 'name', price: 'price_current', batch: 'page' },
}
