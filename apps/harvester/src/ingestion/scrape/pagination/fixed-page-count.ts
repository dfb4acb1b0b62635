import type { PageFetcher } from '../../../scraper/types.js'
import { pageData } from '../kit/extract.js'
import { allAttrs, allTexts, firstText, loadHtml } from '../kit/html.js'
import { getPath } from '../kit/json.js'
import { buildRequest } from '../kit/request.js'
import type { FixedPageCountPlan, LastPageRule, RawPage } from '../types.js'
import { DEFAULT_MAX_PAGES, fetchConcurrently, fetchPage } from './pages.js'
import type { PageStep, StrategyContext } from './pages.js'

function maxOf(numbers: number[]): number | undefined {
  return numbers.length > 0 ? Math.max(...numbers) : undefined
}

function positiveNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

/** Last page number from one rule, or undefined when the rule finds nothing */
export function lastPageFromRule(rule: LastPageRule, page: RawPage): number | undefined {
  switch (rule.kind) {
    case 'links': {
      const $ = loadHtml(page.body)
      const regex = new RegExp(rule.pattern)
      const numbers = allAttrs($, rule.selector, rule.attr ?? 'href')
        .map(value => regex.exec(value)?.[1])
        .filter((value): value is string => value !== undefined)
        .map(value => Number.parseInt(value, 10))
        .filter(value => Number.isFinite(value))
      return maxOf(numbers)
    }
    case 'labels': {
      const $ = loadHtml(page.body)
      const numbers = allTexts($, rule.selector)
        .filter(text => /^\d+$/.test(text))
        .map(text => Number.parseInt(text, 10))
      return maxOf(numbers)
    }
    case 'count': {
      const total = declaredItemCount(rule, page)
      return total === undefined ? undefined : Math.max(1, Math.ceil(total / rule.pageSize))
    }
    case 'json': {
      const total = declaredItemCount(rule, page)
      if (total === undefined) return undefined
      const pageSize = (rule.pageSizePath ? positiveNumber(getPath(pageData(page), rule.pageSizePath)) : undefined) ?? rule.pageSize ?? 1
      return Math.max(1, Math.ceil(total / pageSize))
    }
  }
}

/** Item count a count or json rule reads from the page */
export function declaredItemCount(rule: LastPageRule, page: RawPage): number | undefined {
  if (rule.kind === 'count') {
    const digits = /\d+/.exec(firstText(loadHtml(page.body), rule.selector).replace(/[\s.,](?=\d{3}\b)/g, ''))?.[0]
    return digits === undefined ? undefined : Number.parseInt(digits, 10)
  }
  if (rule.kind === 'json') {
    const total = getPath(pageData(page), rule.totalPath)
    if (total === undefined || total === null) return undefined
    const totalCount = typeof total === 'number' ? total : Number(total)
    return Number.isFinite(totalCount) ? totalCount : undefined
  }
  return undefined
}

export function resolveLastPage(rules: LastPageRule[], page: RawPage): number {
  for (const rule of rules) {
    const last = lastPageFromRule(rule, page)
    if (last !== undefined) return last
  }
  return 1
}

function pageStep(plan: FixedPageCountPlan, context: StrategyContext, index: number): PageStep {
  const bare = index === 1 && plan.page.firstPageBare
  return {
    index,
    request: buildRequest(plan.request, {
      headers: context.headers,
      vars: context.vars,
      params: bare ? [] : [{ placement: plan.page, value: index }],
    }),
  }
}

/**
 * Fetch page 1, read the last page number from it, then fetch 2..last
 * concurrently; page N does not depend on page N-1.
 */
export async function* driveFixedPageCount(
  plan: FixedPageCountPlan,
  fetcher: PageFetcher,
  context: StrategyContext
): AsyncGenerator<RawPage> {
  const first = context.seed ?? (await fetchPage(fetcher, pageStep(plan, context, 1), plan.format))
  const declared = plan.lastPage.map(rule => declaredItemCount(rule, first)).find(count => count !== undefined)
  const reported = resolveLastPage(plan.lastPage, first)
  // Page 1 may only be empty when the source says it has nothing to list
  yield { ...first, expectListings: declared !== 0 }

  const maxPages = plan.maxPages ?? DEFAULT_MAX_PAGES
  const last = Math.min(reported, maxPages)
  if (reported > maxPages) {
    context.log?.warn('Page count capped', { reported, maxPages })
  }
  context.log?.debug('Page count resolved', { last })

  const steps: PageStep[] = []
  for (let index = 2; index <= last; index++) {
    steps.push({ ...pageStep(plan, context, index), expectListings: true })
  }
  yield* fetchConcurrently(fetcher, steps, plan.format)
}
