import type { ILogger } from '@pricegrid/logger'
import type { PageFetcher } from '../../../scraper/types.js'
import type { PaginationPlan, RawPage } from '../types.js'
import { driveBuildId } from './build-id.js'
import { driveChainedCursor } from './chained-cursor.js'
import { driveFixedPageCount } from './fixed-page-count.js'
import { driveOffsetBatch } from './offset-batch.js'
import type { StrategyContext } from './pages.js'

export interface PaginationStrategy {
  readonly name: PaginationPlan['strategy']
  /**
   * Lazily fetch the source's pages in page order. Each call starts over
   * from the first request.
   */
  drive(fetcher: PageFetcher): AsyncIterable<RawPage>
}

export interface CreateStrategyOptions {
  headers?: Record<string, string>
  log?: ILogger
}

export function createStrategy(plan: PaginationPlan, options: CreateStrategyOptions = {}): PaginationStrategy {
  const context: StrategyContext = { headers: options.headers ?? {}, log: options.log }
  return {
    name: plan.strategy,
    drive(fetcher: PageFetcher): AsyncIterable<RawPage> {
      switch (plan.strategy) {
        case 'fixed-page-count':
          return driveFixedPageCount(plan, fetcher, context)
        case 'offset-batch':
          return driveOffsetBatch(plan, fetcher, context)
        case 'chained-cursor':
          return driveChainedCursor(plan, fetcher, context)
        case 'build-id':
          return driveBuildId(plan, fetcher, context)
      }
    },
  }
}

export type { StrategyContext } from './pages.js'
