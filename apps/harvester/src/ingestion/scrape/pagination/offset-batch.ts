import { SchemaDriftError } from '../../../scraper/errors.js'
import type { PageFetcher } from '../../../scraper/types.js'
import { pageData } from '../kit/extract.js'
import { firstText, loadHtml } from '../kit/html.js'
import { getPath } from '../kit/json.js'
import { buildRequest } from '../kit/request.js'
import type { PlacedParam } from '../kit/request.js'
import type { OffsetBatchPlan, RawPage, TotalRule } from '../types.js'
import { fetchConcurrently, fetchPage } from './pages.js'
import type { PageStep, StrategyContext } from './pages.js'

/** Declared total item count of a response */
export function resolveTotal(rule: TotalRule, page: RawPage): number {
  let raw: unknown
  let field: string
  if (rule.kind === 'json') {
    raw = getPath(pageData(page), rule.path)
    field = rule.path
  } else {
    const text = firstText(loadHtml(page.body), rule.selector).replace(/[\s.,](?=\d{3}\b)/g, '')
    raw = /\d+/.exec(text)?.[0]
    field = rule.selector
  }

  const total = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : Number.NaN
  if (!Number.isInteger(total) || total < 0) {
    throw new SchemaDriftError('declared total item count not found', { field, page: page.index })
  }
  return total
}

function batchStep(plan: OffsetBatchPlan, context: StrategyContext, index: number, offset: number): PageStep {
  const params: PlacedParam[] = [{ placement: plan.offset, value: offset }]
  if (plan.limit) {
    params.push({ placement: plan.limit, value: plan.batchSize })
  }
  return {
    index,
    offset,
    request: buildRequest(plan.request, { headers: context.headers, vars: context.vars, params }),
  }
}

/**
 * Fetch offset 0, read the declared total, then fetch every remaining
 * offset (batchSize, 2*batchSize, ...) concurrently.
 */
export async function* driveOffsetBatch(
  plan: OffsetBatchPlan,
  fetcher: PageFetcher,
  context: StrategyContext
): AsyncGenerator<RawPage> {
  const first = context.seed ?? (await fetchPage(fetcher, batchStep(plan, context, 1, 0), plan.format))
  const total = resolveTotal(plan.total, first)
  context.log?.debug('Declared total resolved', { total, batchSize: plan.batchSize })
  yield { ...first, expectListings: total > 0 }

  const steps: PageStep[] = []
  for (let offset = plan.batchSize, index = 2; offset < total; offset += plan.batchSize, index++) {
    steps.push({ ...batchStep(plan, context, index, offset), expectListings: true })
  }
  yield* fetchConcurrently(fetcher, steps, plan.format)
}
