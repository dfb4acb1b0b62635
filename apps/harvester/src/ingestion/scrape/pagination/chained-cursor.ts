import { SchemaDriftError } from '../../../scraper/errors.js'
import type { PageFetcher } from '../../../scraper/types.js'
import { pageData } from '../kit/extract.js'
import { loadHtml } from '../kit/html.js'
import { getPath, scalarToString } from '../kit/json.js'
import { buildRequest } from '../kit/request.js'
import type { ChainedCursorPlan, EmptyPageRule, HasMoreRule, RawPage } from '../types.js'
import { DEFAULT_MAX_PAGES, fetchPage } from './pages.js'
import type { StrategyContext } from './pages.js'

export function readHasMore(rule: HasMoreRule, page: RawPage): boolean {
  if (rule.kind === 'json') {
    const value = getPath(pageData(page), rule.path)
    return value === true || (typeof value === 'string' && value.trim().toLowerCase() === 'true')
  }
  const element = loadHtml(page.body)(rule.selector).first()
  if (element.length === 0) return false
  return element.text().trim().toLowerCase() === (rule.equals ?? 'true').toLowerCase()
}

export function isEmptyPage(rule: EmptyPageRule, page: RawPage): boolean {
  if (rule.kind === 'json') {
    const value = getPath(pageData(page), rule.path)
    return !Array.isArray(value) || value.length === 0
  }
  return loadHtml(page.body)(rule.selector).length === 0
}

/**
 * Follow a continuation chain strictly one request at a time: the next
 * cursor is only known once the current response has been read.
 */
export async function* driveChainedCursor(
  plan: ChainedCursorPlan,
  fetcher: PageFetcher,
  context: StrategyContext
): AsyncGenerator<RawPage> {
  const maxPages = plan.maxPages ?? DEFAULT_MAX_PAGES
  const cursorRule = plan.cursor
  let cursor: string | number | null = cursorRule.kind === 'counter' ? cursorRule.start ?? 0 : null
  const seen = new Set<string>()

  for (let index = 1; ; index++) {
    if (index > maxPages) {
      throw new SchemaDriftError(`cursor chain exceeded ${maxPages} pages`, { field: 'cursor', page: index })
    }

    const request = buildRequest(plan.request, {
      headers: context.headers,
      vars: context.vars,
      params: [{ placement: cursorRule.param, value: cursor }],
    })
    const page = await fetchPage(
      fetcher,
      { index, offset: typeof cursor === 'number' ? cursor : undefined, request },
      plan.format
    )
    // Later pages follow a has-more, unless an empty page is how the chain ends
    yield { ...page, expectListings: index === 1 || !plan.stopOnEmpty }

    if (plan.stopOnEmpty && isEmptyPage(plan.stopOnEmpty, page)) {
      context.log?.debug('Cursor chain ended on an empty page', { index })
      return
    }
    if (!readHasMore(plan.hasMore, page)) {
      return
    }

    if (cursorRule.kind === 'counter') {
      cursor = (typeof cursor === 'number' ? cursor : 0) + (cursorRule.step ?? 1)
      continue
    }

    const next = scalarToString(getPath(pageData(page), cursorRule.nextPath))
    if (!next) {
      throw new SchemaDriftError('has-more is set but no next cursor was returned', {
        field: cursorRule.nextPath,
        page: index,
      })
    }
    if (seen.has(next)) {
      throw new SchemaDriftError(`cursor ${next} repeated`, { field: cursorRule.nextPath, page: index })
    }
    seen.add(next)
    cursor = next
  }
}
