/**
 * Crawl error taxonomy
 *
 * Transport failures are values (see TransportResult); everything that
 * escapes a transport call is one of the classes below. Pipeline code turns
 * them into per-source failure reports with classifyCrawlError().
 */

export type TransportFailureKind =
  | 'Timeout'
  | 'ConnectionRefused'
  | 'ForbiddenStatus'
  | 'DecodeError'
  | 'ProtocolError'
  | 'HttpStatus'
  | 'NetworkError'

/** Failure kinds the governor escalates to the fallback transport */
export const FALLBACK_ELIGIBLE_KINDS: ReadonlySet<TransportFailureKind> = new Set<TransportFailureKind>([
  'Timeout',
  'ForbiddenStatus',
  'ProtocolError',
  'DecodeError',
])

export function isFallbackEligible(kind: TransportFailureKind): boolean {
  return FALLBACK_ELIGIBLE_KINDS.has(kind)
}

/**
 * Both transports failed (or the primary failed with a kind the fallback
 * cannot fix). Carries the last failure kind and every attempted kind.
 */
export class SourceUnavailableError extends Error {
  readonly kind: TransportFailureKind
  readonly attempts: TransportFailureKind[]
  readonly url: string
  readonly statusCode?: number

  constructor(options: { kind: TransportFailureKind; attempts: TransportFailureKind[]; url: string; statusCode?: number; detail?: string }) {
    const suffix = options.detail ? `: ${options.detail}` : ''
    super(`Source unavailable (${options.kind}) for ${options.url}${suffix}`)
    this.name = 'SourceUnavailableError'
    this.kind = options.kind
    this.attempts = options.attempts
    this.url = options.url
    this.statusCode = options.statusCode
  }
}

export interface SchemaDriftContext {
  source?: string
  field?: string
  page?: number
}

/**
 * A structural assumption about a source no longer holds: a missing build
 * identifier, a JSON path that resolves to nothing, a required field with
 * no value. Fatal for the source run.
 */
export class SchemaDriftError extends Error {
  readonly detail: string
  readonly source?: string
  readonly field?: string
  readonly page?: number

  constructor(detail: string, context: SchemaDriftContext = {}) {
    const where = [
      context.source ? `source=${context.source}` : undefined,
      context.field ? `field=${context.field}` : undefined,
      context.page !== undefined ? `page=${context.page}` : undefined,
    ].filter((part): part is string => part !== undefined)
    super(where.length > 0 ? `Schema drift: ${detail} (${where.join(', ')})` : `Schema drift: ${detail}`)
    this.name = 'SchemaDriftError'
    this.detail = detail
    this.source = context.source
    this.field = context.field
    this.page = context.page
  }

  withContext(context: SchemaDriftContext): SchemaDriftError {
    return new SchemaDriftError(this.detail, {
      source: this.source ?? context.source,
      field: this.field ?? context.field,
      page: this.page ?? context.page,
    })
  }
}

/** Record has neither a product id nor a URL */
export class IdentityMissingError extends Error {
  readonly page?: number

  constructor(page?: number) {
    super(page !== undefined ? `Record on page ${page} has no identity key` : 'Record has no identity key')
    this.name = 'IdentityMissingError'
    this.page = page
  }
}

/** The caller cancelled the fetch (a sibling page failed) */
export class FetchAbortedError extends Error {
  readonly url: string

  constructor(url: string) {
    super(`Fetch aborted: ${url}`)
    this.name = 'FetchAbortedError'
    this.url = url
  }
}

export type CrawlFailureKind = 'SourceUnavailable' | 'SchemaDrift' | 'Unexpected'

export interface ClassifiedCrawlError {
  kind: CrawlFailureKind
  message: string
  transportKind?: TransportFailureKind
  field?: string
  page?: number
}

export function classifyCrawlError(error: unknown): ClassifiedCrawlError {
  if (error instanceof SourceUnavailableError) {
    return { kind: 'SourceUnavailable', message: error.message, transportKind: error.kind }
  }
  if (error instanceof SchemaDriftError) {
    return { kind: 'SchemaDrift', message: error.message, field: error.field, page: error.page }
  }
  return {
    kind: 'Unexpected',
    message: error instanceof Error ? error.message : String(error),
  }
}

/**
 * Walk an error and its `cause` chain for a Node-style `code`
 * (ECONNREFUSED, ETIMEDOUT, UND_ERR_CONNECT_TIMEOUT, Z_DATA_ERROR).
 */
export function errorCodeOf(error: unknown): string | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }
    current = 'cause' in current ? current.cause : undefined
  }
  return undefined
}

export function errorNameOf(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined
}
