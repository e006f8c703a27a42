import { Hono } from 'hono'
import type { BusinessSearchAggregator } from '../services/business-search.js'
import { searchBusinesses, searchRequestSchema } from '../services/lead-search.js'
import { validateBody } from '../middleware/validator.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('search-routes')

export interface SearchRouteDeps {
  aggregator: BusinessSearchAggregator
}

export function createSearchRoutes({ aggregator }: SearchRouteDeps) {
  const search = new Hono()

  /**
   * POST /api/v1/search
   * Search a city for businesses; the body follows searchRequestSchema
   */
  search.post('/', validateBody(searchRequestSchema), async (c) => {
    try {
      const request = c.req.valid('json')
      const result = await searchBusinesses(aggregator, request)
      return c.json(result, result.status === 'success' ? 200 : 422)
    } catch (error) {
      logger.error('Search failed', errorMessage(error))
      return c.json(
        {
          success: false,
          error: 'Search failed',
          message: error instanceof Error ? error.message : 'Unknown error',
        },
        500
      )
    }
  })

  return search
}
