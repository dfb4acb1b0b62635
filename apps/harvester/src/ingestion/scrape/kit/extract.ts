/**
 * Declarative record extractor
 *
 * Turns one RawPage into source-native records using a RecordMapping:
 * locate the items, evaluate each field's rule chain, clean the value,
 * then apply the exclusion, identity and required-field checks.
 */

import type { Cheerio, CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import type { ILogger } from '@pricegrid/logger'
import { IdentityMissingError, SchemaDriftError } from '../../../scraper/errors.js'
import type {
  ExtractionRule,
  FieldMapping,
  FieldValue,
  RawPage,
  RawRecord,
  RecordMapping,
  SourceIdentity,
  ValueMatch,
  ValueTransform,
} from '../types.js'
import { collapseWhitespace, loadHtml } from './html.js'
import { getPath, safeJsonParse, scalarToString } from './json.js'
import { applyCleaner } from './normalize.js'

type ItemScope =
  | { kind: 'html'; $: CheerioAPI; element: Cheerio<Element> }
  | { kind: 'json'; value: unknown }

export interface ExtractOptions {
  source: string
  identity: SourceIdentity
  log?: ILogger
}

export interface ExtractResult {
  records: RawRecord[]
  /** Listings without product id and URL */
  skipped: number
  /** Listings dropped by excludeWhenMissing */
  excluded: number
}

const regexCache = new Map<string, RegExp>()

function compile(pattern: string, flags = ''): RegExp {
  const key = `${flags}/${pattern}`
  let regex = regexCache.get(key)
  if (!regex) {
    regex = new RegExp(pattern, flags)
    regexCache.set(key, regex)
  }
  return regex
}

/** Parsed JSON of a json page; drift if the body is not JSON */
export function pageData(page: RawPage): unknown {
  if (page.data !== undefined) return page.data
  const parsed = safeJsonParse(page.body)
  if (!parsed.ok) {
    throw new SchemaDriftError(`response is not JSON: ${parsed.error}`, { page: page.index })
  }
  return parsed.value
}

function htmlItems(html: string, itemSelector: string): ItemScope[] {
  const $ = loadHtml(html)
  return $<Element, string>(itemSelector)
    .toArray()
    .map(element => ({ kind: 'html' as const, $, element: $(element) }))
}

function locateItems(page: RawPage, mapping: RecordMapping): ItemScope[] {
  const source = mapping.source
  switch (source.kind) {
    case 'html':
      return htmlItems(page.body, source.itemSelector)
    case 'json': {
      const items = getPath(pageData(page), source.itemsPath)
      if (items === null) return []
      if (!Array.isArray(items)) {
        throw new SchemaDriftError(`items path does not resolve to a list`, { field: source.itemsPath, page: page.index })
      }
      return items.map(value => ({ kind: 'json' as const, value }))
    }
    case 'json-html': {
      const html = getPath(pageData(page), source.htmlPath)
      if (typeof html !== 'string') {
        throw new SchemaDriftError(`HTML fragment path does not resolve to text`, { field: source.htmlPath, page: page.index })
      }
      return htmlItems(html, source.itemSelector)
    }
  }
}

function itemLocation(mapping: RecordMapping): string {
  const source = mapping.source
  return source.kind === 'json' ? source.itemsPath : source.itemSelector
}

function pickElement(
  scope: Extract<ItemScope, { kind: 'html' }>,
  selector: string | undefined,
  pick: 'first' | 'last' = 'first',
  withText?: string
): Cheerio<Element> | undefined {
  let matches = selector ? scope.element.find(selector) : scope.element
  if (withText) {
    const regex = compile(withText, 'i')
    matches = matches.filter((_, element) => regex.test(collapseWhitespace(scope.$(element).text())))
  }
  if (matches.length === 0) return undefined
  return pick === 'last' ? matches.last() : matches.first()
}

function evaluateRule(rule: ExtractionRule, scope: ItemScope, page: RawPage): FieldValue | undefined {
  switch (rule.kind) {
    case 'text': {
      if (scope.kind !== 'html') return undefined
      const element = pickElement(scope, rule.selector, rule.pick, rule.withText)
      return element ? collapseWhitespace(element.text()) : undefined
    }
    case 'attr': {
      if (scope.kind !== 'html') return undefined
      return pickElement(scope, rule.selector, rule.pick, rule.withText)?.attr(rule.attr)?.trim()
    }
    case 'texts': {
      if (scope.kind !== 'html') return undefined
      const texts = scope.element
        .find(rule.selector)
        .toArray()
        .map(element => collapseWhitespace(scope.$(element).text()))
        .filter(text => text.length > 0)
      return texts.join(rule.separator ?? '; ')
    }
    case 'exists':
      return scope.kind === 'html' ? scope.element.find(rule.selector).length > 0 : undefined
    case 'json':
      return scope.kind === 'json' ? jsonScalar(getPath(scope.value, rule.path)) : undefined
    case 'attrJson': {
      if (scope.kind !== 'html') return undefined
      const raw = pickElement(scope, rule.selector)?.attr(rule.attr)
      if (!raw) return undefined
      const parsed = safeJsonParse(raw)
      return parsed.ok ? jsonScalar(getPath(parsed.value, rule.path)) : undefined
    }
    case 'jsonList': {
      if (scope.kind !== 'json') return undefined
      const list = getPath(scope.value, rule.path)
      if (!Array.isArray(list)) return undefined
      return list
        .map(entry => scalarToString(rule.itemPath ? getPath(entry, rule.itemPath) : entry)?.trim())
        .filter((text): text is string => text !== undefined && text.length > 0)
        .join(rule.separator ?? '; ')
    }
    case 'page':
      return rule.value === 'index' ? page.index : page.offset
    case 'const':
      return rule.value
  }
}

function jsonScalar(value: unknown): FieldValue | undefined {
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (value === null || typeof value === 'boolean') return value
  return undefined
}

function applyMatch(value: string, match: ValueMatch): string | undefined {
  const result = compile(match.pattern, match.flags).exec(value)
  if (!result) return undefined
  if (match.template !== undefined) {
    return match.template.replace(/\$(\d+)/g, (_, group: string) => result[Number(group)] ?? '')
  }
  const group = match.group ?? (result.length > 1 ? 1 : 0)
  return result[group]
}

function applyTransform(value: string, transform: ValueTransform, pageUrl: string): string | undefined {
  switch (transform) {
    case 'absoluteUrl':
      try {
        return new URL(value, pageUrl).href
      } catch {
        return undefined
      }
    case 'stripQuery':
      return value.split('?')[0]?.trim()
  }
}

function isEmpty(value: FieldValue | undefined): value is null | undefined | '' {
  return value === undefined || value === null || value === ''
}

function isZero(value: FieldValue): boolean {
  if (typeof value === 'number') return value === 0
  if (typeof value === 'string') return value.trim() !== '' && Number(value.replace(',', '.')) === 0
  return false
}

function postProcess(rule: ExtractionRule, value: FieldValue, pageUrl: string): FieldValue | undefined {
  if (rule.nonZero && isZero(value)) return undefined
  if (value === null || typeof value === 'boolean') return value
  if (typeof value === 'number' && !rule.match && !rule.prefix && !rule.transforms) return value

  let text: string | undefined = String(value)
  if (rule.match) {
    text = applyMatch(text, rule.match)
  }
  if (text && rule.prefix) {
    text = rule.prefix + text
  }
  for (const transform of rule.transforms ?? []) {
    if (!text) break
    text = applyTransform(text, transform, pageUrl)
  }
  return text
}

function evaluateField(field: FieldMapping, scope: ItemScope, page: RawPage): FieldValue {
  for (const rule of field.rules) {
    const raw = evaluateRule(rule, scope, page)
    if (isEmpty(raw)) continue
    const value = postProcess(rule, raw, page.url)
    if (isEmpty(value)) continue
    return field.clean ? applyCleaner(field.clean, value) : value
  }
  return null
}

/** Identity key of a native record: product id, falling back to URL */
export function identityKeyOf(record: RawRecord, identity: SourceIdentity): string | undefined {
  for (const field of [identity.productId, identity.url]) {
    if (!field) continue
    const value = record[field]
    if (value === null || value === undefined) continue
    const key = String(value).trim()
    if (key) return key
  }
  return undefined
}

export function resolveIdentity(record: RawRecord, identity: SourceIdentity, page?: number): string {
  const key = identityKeyOf(record, identity)
  if (key === undefined) {
    throw new IdentityMissingError(page)
  }
  return key
}

export function extractRecords(page: RawPage, mapping: RecordMapping, options: ExtractOptions): ExtractResult {
  const result: ExtractResult = { records: [], skipped: 0, excluded: 0 }

  let items: ItemScope[]
  try {
    items = locateItems(page, mapping)
  } catch (error) {
    throw error instanceof SchemaDriftError ? error.withContext({ source: options.source }) : error
  }

  if (items.length === 0 && page.expectListings) {
    throw new SchemaDriftError('no listings found on an announced page', {
      source: options.source,
      field: itemLocation(mapping),
      page: page.index,
    })
  }

  items.forEach((scope, position) => {
    const record: RawRecord = {}
    for (const field of mapping.fields) {
      record[field.field] = evaluateField(field, scope, page)
    }

    if (mapping.excludeWhenMissing?.some(field => isEmpty(record[field]))) {
      result.excluded++
      return
    }

    try {
      resolveIdentity(record, options.identity, page.index)
    } catch (error) {
      if (!(error instanceof IdentityMissingError)) throw error
      result.skipped++
      options.log?.warn('Record skipped', { source: options.source, page: page.index, position, reason: error.message })
      return
    }

    const missing = mapping.fields.find(field => field.required && isEmpty(record[field.field]))
    if (missing) {
      throw new SchemaDriftError(`required field is empty`, {
        source: options.source,
        field: missing.field,
        page: page.index,
      })
    }

    result.records.push(record)
  })

  return result
}
