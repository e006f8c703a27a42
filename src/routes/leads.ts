import { Hono } from 'hono'
import { z } from 'zod'
import type { BusinessSearchAggregator } from '../services/business-search.js'
import type { LeadRepository } from '../services/lead-store.js'
import { saveLeadsForCity } from '../services/save-leads.js'
import { validateBody } from '../middleware/validator.js'

const saveLeadsSchema = z.object({
  city: z.string().trim().min(1),
  business_type: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
})

export interface LeadRouteDeps {
  aggregator: BusinessSearchAggregator
  leadRepository: LeadRepository | null
}

export function createLeadRoutes(deps: LeadRouteDeps) {
  const leads = new Hono()

  /**
   * POST /api/v1/leads
   * Search a city and store its leads
   */
  leads.post('/', validateBody(saveLeadsSchema), async (c) => {
    const { city, business_type } = c.req.valid('json')
    const result = await saveLeadsForCity(deps, city, business_type)

    if (result.success) {
      return c.json(result, 201)
    }
    // Sample data means the Maps API is down, not the lead store
    if (result.data_source === 'fallback') {
      return c.json(result, 503)
    }
    return c.json(result, deps.leadRepository ? 502 : 503)
  })

  return leads
}
