import { createLogger } from '@pricegrid/logger'

export const logger = createLogger('harvester')

export const loggers = {
  crawl: logger.child('crawl'),
  fetch: logger.child('fetch'),
  extract: logger.child('extract'),
  combine: logger.child('combine'),
}
