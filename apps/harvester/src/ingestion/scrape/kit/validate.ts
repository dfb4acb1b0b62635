import { isIP } from 'node:net'
import { isCanonicalColumn } from '../../../combine/schema.js'
import { isSourceId } from '../types.js'
import type {
  FixedPageCountPlan,
  LastPageRule,
  OffsetBatchPlan,
  PageFormat,
  PaginationPlan,
  RequestTemplate,
  SourceManifest,
} from '../types.js'
import { fillTokens } from './request.js'

export type ValidateManifestResult = { ok: true } | { ok: false; errors: string[] }

const BLOCKED_HOSTNAMES = new Set(['localhost', 'localhost.localdomain'])

/** https URL whose host is a public DNS name (no localhost, no IP literals) */
export function validateBaseUrl(raw: string): string | undefined {
  let url: URL
  try {
    url = new URL(raw)
  } catch {
    return `base URL '${raw}' is not a valid URL`
  }
  if (url.protocol !== 'https:') {
    return `base URL '${raw}' must use https`
  }
  const host = url.hostname.toLowerCase().replace(/^\[|\]$/g, '')
  if (BLOCKED_HOSTNAMES.has(host) || host.endsWith('.localhost')) {
    return `base URL '${raw}' points at a local host`
  }
  if (isIP(host) !== 0) {
    return `base URL '${raw}' must use a host name, not an IP address`
  }
  if (!host.includes('.')) {
    return `base URL '${raw}' must use a fully qualified host name`
  }
  return undefined
}

function patternError(pattern: string, where: string): string | undefined {
  try {
    new RegExp(pattern)
    return undefined
  } catch (error) {
    return `${where}: invalid pattern '${pattern}' (${error instanceof Error ? error.message : 'unknown error'})`
  }
}

function requestHost(template: RequestTemplate): string | undefined {
  try {
    return new URL(fillTokens(template.url, { buildId: 'build' })).hostname.toLowerCase()
  } catch {
    return undefined
  }
}

function lastPageErrors(rules: LastPageRule[]): string[] {
  const errors: string[] = []
  rules.forEach((rule, index) => {
    const where = `pagination.lastPage[${index}]`
    if (rule.kind === 'links') {
      const error = patternError(rule.pattern, where)
      if (error) errors.push(error)
    }
    if (rule.kind === 'count' && !(rule.pageSize > 0)) {
      errors.push(`${where}.pageSize must be > 0`)
    }
    if (rule.kind === 'json' && rule.pageSize !== undefined && !(rule.pageSize > 0)) {
      errors.push(`${where}.pageSize must be > 0`)
    }
  })
  return errors
}

function pagedPlanErrors(plan: FixedPageCountPlan | OffsetBatchPlan): string[] {
  if (plan.strategy === 'fixed-page-count') {
    const errors = lastPageErrors(plan.lastPage)
    if (plan.maxPages !== undefined && !(plan.maxPages >= 1)) {
      errors.push('pagination.maxPages must be >= 1')
    }
    return errors
  }
  return Number.isInteger(plan.batchSize) && plan.batchSize > 0 ? [] : ['pagination.batchSize must be a positive integer']
}

function planErrors(plan: PaginationPlan): string[] {
  switch (plan.strategy) {
    case 'fixed-page-count':
    case 'offset-batch':
      return pagedPlanErrors(plan)
    case 'chained-cursor': {
      const errors: string[] = []
      if (plan.maxPages !== undefined && !(plan.maxPages >= 1)) {
        errors.push('pagination.maxPages must be >= 1')
      }
      if (plan.cursor.kind === 'counter' && plan.cursor.step !== undefined && !(plan.cursor.step > 0)) {
        errors.push('pagination.cursor.step must be > 0')
      }
      return errors
    }
    case 'build-id': {
      const errors = pagedPlanErrors(plan.then)
      const error = patternError(plan.pattern, 'pagination.pattern')
      // An empty alternative always matches; the match length is the group count plus one
      if (error) {
        errors.push(error)
      } else if (new RegExp(`${plan.pattern}|`).exec('')?.length === 1) {
        errors.push('pagination.pattern must capture the build identifier in group 1')
      }
      if (!plan.then.request.url.includes('{buildId}')) {
        errors.push('pagination.then.request.url must contain {buildId}')
      }
      return errors
    }
  }
}

function dataFormat(plan: PaginationPlan): PageFormat {
  return plan.strategy === 'build-id' ? plan.then.format : plan.format
}

function templates(plan: PaginationPlan): RequestTemplate[] {
  return plan.strategy === 'build-id' ? [plan.bootstrap, plan.then.request] : [plan.request]
}

/**
 * Check a source manifest for mistakes that would otherwise only show up
 * mid-crawl. Collects every problem instead of stopping at the first.
 */
export function validateManifest(manifest: SourceManifest): ValidateManifestResult {
  const errors: string[] = []

  if (!isSourceId(manifest.id)) {
    errors.push(`id '${manifest.id}' is not a known source`)
  }
  if (!manifest.label.trim()) {
    errors.push('label is required')
  }
  if (manifest.baseUrls.length === 0) {
    errors.push('at least one base URL is required')
  }
  for (const baseUrl of manifest.baseUrls) {
    const error = validateBaseUrl(baseUrl)
    if (error) errors.push(error)
  }

  const baseHosts = new Set(
    manifest.baseUrls.flatMap(baseUrl => {
      try {
        return [new URL(baseUrl).hostname.toLowerCase()]
      } catch {
        return []
      }
    })
  )
  for (const template of templates(manifest.pagination)) {
    const host = requestHost(template)
    if (!host || !baseHosts.has(host)) {
      errors.push(`request URL '${template.url}' is not on a base host`)
    }
  }

  const rateLimit = manifest.rateLimit
  if (rateLimit?.maxConcurrent !== undefined && !(Number.isInteger(rateLimit.maxConcurrent) && rateLimit.maxConcurrent > 0)) {
    errors.push('rateLimit.maxConcurrent must be a positive integer')
  }
  if (rateLimit?.minDelayMs !== undefined && !(rateLimit.minDelayMs >= 0)) {
    errors.push('rateLimit.minDelayMs must be >= 0')
  }

  errors.push(...planErrors(manifest.pagination))

  const format = dataFormat(manifest.pagination)
  const sourceKind = manifest.records.source.kind
  if (sourceKind === 'html' && format !== 'html') {
    errors.push('records.source html needs html pages')
  }
  if (sourceKind !== 'html' && format !== 'json') {
    errors.push(`records.source ${sourceKind} needs json pages`)
  }

  const seen = new Set<string>()
  for (const mapping of manifest.records.fields) {
    const field = mapping.field
    if (seen.has(field)) {
      errors.push(`field '${field}' is mapped twice`)
    }
    seen.add(field)

    const column = manifest.renames[field] ?? field
    if (!isCanonicalColumn(column) || column === 'source') {
      errors.push(`field '${field}' has no canonical column (renamed to '${column}')`)
    }
    if (mapping.rules.length === 0) {
      errors.push(`field '${field}' has no extraction rules`)
    }
  }

  for (const renamed of Object.keys(manifest.renames)) {
    if (!seen.has(renamed)) {
      errors.push(`rename of unknown field '${renamed}'`)
    }
  }

  for (const field of manifest.records.excludeWhenMissing ?? []) {
    if (!seen.has(field)) {
      errors.push(`excludeWhenMissing names unknown field '${field}'`)
    }
  }

  const { productId, url } = manifest.identity
  if (productId !== undefined) {
    if (!seen.has(productId)) {
      errors.push(`identity.productId field '${productId}' is not mapped`)
    } else if ((manifest.renames[productId] ?? productId) !== 'product_id') {
      errors.push(`identity.productId field '${productId}' must become product_id`)
    }
  }
  if (!seen.has(url)) {
    errors.push(`identity.url field '${url}' is not mapped`)
  } else if ((manifest.renames[url] ?? url) !== 'url') {
    errors.push(`identity.url field '${url}' must become url`)
  }

  for (const mapping of manifest.records.fields) {
    for (const rule of mapping.rules) {
      if (!rule.match) continue
      const error = patternError(rule.match.pattern, `field '${mapping.field}'`)
      if (error) errors.push(error)
    }
  }

  return errors.length === 0 ? { ok: true } : { ok: false, errors }
}
