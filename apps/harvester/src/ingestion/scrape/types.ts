import type { HttpMethod } from '../../scraper/types.js'

// ============================================================================
// Sources
// ============================================================================

export const SOURCE_IDS = [
  'bakuelectronics',
  'birmarket',
  'bytelecom',
  'irshad',
  'kontakt',
  'mgstore',
  'smartelectronics',
  'soliton',
  'tapaz',
  'texnohome',
  'wtaz',
] as const

export type SourceId = (typeof SOURCE_IDS)[number]

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some(id => id === value)
}

export type PageFormat = 'html' | 'json'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type QueryValue = string | number | Array<string | number>

/**
 * Declarative request. `{token}` placeholders in the URL, query values and
 * JSON string values are filled by the strategy (e.g. `{buildId}`).
 */
export interface RequestTemplate {
  url: string
  method?: HttpMethod
  query?: Record<string, QueryValue>
  /** application/x-www-form-urlencoded body */
  form?: Record<string, string | number>
  /** application/json body */
  json?: JsonValue
  headers?: Record<string, string>
}

/** Where a strategy writes its page number, offset or cursor */
export interface ParamPlacement {
  in: 'query' | 'form' | 'json'
  /** Parameter name; a dotted path for `json` */
  name: string
}

// ============================================================================
// Pagination plans
// ============================================================================

export type LastPageRule =
  /** Highest number captured from link attributes in the pagination control */
  | { kind: 'links'; selector: string; attr?: string; pattern: string }
  /** Highest integer among the texts of the pagination control */
  | { kind: 'labels'; selector: string }
  /** First integer in an item-count element divided by the page size */
  | { kind: 'count'; selector: string; pageSize: number }
  /** Total and page size read from a JSON page */
  | { kind: 'json'; totalPath: string; pageSizePath?: string; pageSize?: number }

export interface FixedPageCountPlan {
  strategy: 'fixed-page-count'
  format: PageFormat
  request: RequestTemplate
  page: ParamPlacement & {
    /** Page 1 is requested without the page parameter */
    firstPageBare?: boolean
  }
  /** Tried in order; the first that yields a number wins. Empty: one page. */
  lastPage: LastPageRule[]
  maxPages?: number
}

export type TotalRule =
  | { kind: 'json'; path: string }
  | { kind: 'count'; selector: string }

export interface OffsetBatchPlan {
  strategy: 'offset-batch'
  format: PageFormat
  request: RequestTemplate
  batchSize: number
  offset: ParamPlacement
  limit?: ParamPlacement
  total: TotalRule
}

export type CursorRule =
  /** Opaque token read from the response */
  | { kind: 'token'; param: ParamPlacement; nextPath: string }
  /** Page counter; the next value is only sent after has-more is read */
  | { kind: 'counter'; param: ParamPlacement; start?: number; step?: number }

export type HasMoreRule =
  | { kind: 'json'; path: string }
  /** Element text equal to `equals` (default "true", case-insensitive); missing element means no more */
  | { kind: 'selector'; selector: string; equals?: string }

export type EmptyPageRule =
  | { kind: 'json'; path: string }
  | { kind: 'selector'; selector: string }

export interface ChainedCursorPlan {
  strategy: 'chained-cursor'
  format: PageFormat
  request: RequestTemplate
  cursor: CursorRule
  hasMore: HasMoreRule
  stopOnEmpty?: EmptyPageRule
  maxPages?: number
}

export interface BuildIdPlan {
  strategy: 'build-id'
  bootstrap: RequestTemplate
  /** First capture group is the build identifier */
  pattern: string
  /** JSON embedded in the bootstrap document used as page 1 */
  initialData?: { selector: string; path?: string }
  /** Plan whose templates contain `{buildId}` */
  then: FixedPageCountPlan | OffsetBatchPlan
}

export type PaginationPlan = FixedPageCountPlan | OffsetBatchPlan | ChainedCursorPlan | BuildIdPlan

export interface RawPage {
  /** 1-based position in the source's page sequence */
  index: number
  /** Offset (offset-batch) or counter value (chained counter) sent for this page */
  offset?: number
  url: string
  format: PageFormat
  body: string
  /** Parsed JSON for json pages */
  data?: unknown
  /**
   * Set by the strategy when the source announced listings on this page
   * (page count, declared total or has-more); finding none is drift
   */
  expectListings?: boolean
}

// ============================================================================
// Record mapping
// ============================================================================

export type RecordSource =
  | { kind: 'html'; itemSelector: string }
  | { kind: 'json'; itemsPath: string }
  /** JSON response carrying an HTML fragment */
  | { kind: 'json-html'; htmlPath: string; itemSelector: string }

export interface ValueMatch {
  pattern: string
  flags?: string
  /** Capture group to keep (default 1, or 0 without groups) */
  group?: number
  /** `$1`-style template applied to the match instead of `group` */
  template?: string
}

export type ValueTransform = 'absoluteUrl' | 'stripQuery'

export type RulePick = 'first' | 'last'

interface RuleOptions {
  match?: ValueMatch
  prefix?: string
  transforms?: ValueTransform[]
  /** Treat 0 and "0" as empty so the next rule is tried */
  nonZero?: boolean
}

export type ExtractionRule = RuleOptions &
  (
    | { kind: 'text'; selector?: string; pick?: RulePick; withText?: string }
    | { kind: 'attr'; selector?: string; attr: string; pick?: RulePick; withText?: string }
    | { kind: 'texts'; selector: string; separator?: string }
    | { kind: 'exists'; selector: string }
    | { kind: 'json'; path: string }
    | { kind: 'attrJson'; selector?: string; attr: string; path: string }
    | { kind: 'jsonList'; path: string; itemPath?: string; separator?: string }
    | { kind: 'page'; value: 'index' | 'offset' }
    | { kind: 'const'; value: string | number | boolean }
  )

export type CleanerName =
  | 'price'
  | 'commaGroupedPrice'
  | 'number'
  | 'integer'
  | 'percent'
  | 'stock'
  | 'outOfStockFlag'
  | 'flag'
  | 'text'

export interface FieldMapping {
  field: string
  /** Fallback chain; the first non-empty value wins */
  rules: ExtractionRule[]
  clean?: CleanerName
  /** A listing without this field means the markup changed */
  required?: boolean
}

export interface RecordMapping {
  source: RecordSource
  /** Field order is the per-source CSV column order */
  fields: FieldMapping[]
  /** Listings missing any of these fields are excluded (e.g. no price) */
  excludeWhenMissing?: string[]
}

export type FieldValue = string | number | boolean | null

/** Source-native field name to value, as extracted from one page */
export type RawRecord = Record<string, FieldValue>

// ============================================================================
// Manifest
// ============================================================================

export interface SourceRateLimit {
  maxConcurrent?: number
  minDelayMs?: number
}

export interface SourceIdentity {
  /** Native field holding the product id, if the source has one */
  productId?: string
  url: string
}

export interface SourceManifest {
  id: SourceId
  /** Value written to the `source` column */
  label: string
  version: string
  baseUrls: string[]
  headers?: Record<string, string>
  rateLimit?: SourceRateLimit
  identity: SourceIdentity
  pagination: PaginationPlan
  records: RecordMapping
  /** Native field name → canonical column */
  renames: Record<string, string>
}
