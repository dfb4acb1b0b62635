import { SchemaDriftError } from '../../../scraper/errors.js'
import type { PageFetcher } from '../../../scraper/types.js'
import { loadHtml, rawText } from '../kit/html.js'
import { getPath, safeJsonParse } from '../kit/json.js'
import { buildRequest } from '../kit/request.js'
import type { BuildIdPlan, RawPage } from '../types.js'
import { driveFixedPageCount } from './fixed-page-count.js'
import { driveOffsetBatch } from './offset-batch.js'
import type { StrategyContext } from './pages.js'

export function extractBuildId(html: string, pattern: string): string {
  const buildId = new RegExp(pattern).exec(html)?.[1]
  if (!buildId) {
    throw new SchemaDriftError('build identifier not found in bootstrap document', { field: 'buildId' })
  }
  return buildId
}

/** The first data page embedded in the bootstrap document, if present */
export function embeddedFirstPage(plan: BuildIdPlan, html: string, url: string): RawPage | undefined {
  if (!plan.initialData) return undefined
  const script = rawText(loadHtml(html), plan.initialData.selector)
  if (!script) return undefined
  const parsed = safeJsonParse(script)
  if (!parsed.ok) return undefined
  const data = plan.initialData.path ? getPath(parsed.value, plan.initialData.path) : parsed.value
  if (data === undefined || data === null) return undefined

  const isOffset = plan.then.strategy === 'offset-batch'
  return {
    index: 1,
    offset: isOffset ? 0 : undefined,
    url,
    format: 'json',
    body: JSON.stringify(data),
    data,
  }
}

/**
 * Read the deployment identifier from a fresh bootstrap document on every
 * run, then page through data endpoints that embed it.
 */
export async function* driveBuildId(plan: BuildIdPlan, fetcher: PageFetcher, context: StrategyContext): AsyncGenerator<RawPage> {
  const request = buildRequest(plan.bootstrap, { headers: context.headers, vars: context.vars })
  const bootstrap = await fetcher.fetch(request)
  const buildId = extractBuildId(bootstrap.text, plan.pattern)
  context.log?.debug('Build identifier extracted', { buildId })

  const inner: StrategyContext = {
    ...context,
    vars: { ...context.vars, buildId },
    seed: embeddedFirstPage(plan, bootstrap.text, request.url),
  }

  if (plan.then.strategy === 'fixed-page-count') {
    yield* driveFixedPageCount(plan.then, fetcher, inner)
  } else {
    yield* driveOffsetBatch(plan.then, fetcher, inner)
  }
}
