import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { logger as requestLogger } from 'hono/logger'
import type { PlaceSearchCapability } from './providers/types.js'
import type { BusinessSearchAggregator } from './services/business-search.js'
import type { LeadFinderAgent } from './services/agent.js'
import type { LeadRepository } from './services/lead-store.js'
import type { OnDemandClient } from './services/ondemand.service.js'
import type { OnDemandConfig } from './config/ondemand.js'
import { createAgentRoutes } from './routes/a2a.js'
import { createSearchRoutes } from './routes/search.js'
import { createLeadRoutes } from './routes/leads.js'
import { createOnDemandRoutes } from './routes/ondemand.js'
import { errorMessage } from './errors.js'
import { createLogger } from './utils/logger.js'

const logger = createLogger('api')

export interface AppDependencies {
  capability: PlaceSearchCapability | null
  aggregator: BusinessSearchAggregator
  agent: LeadFinderAgent
  leadRepository: LeadRepository | null
  ondemand: { client: OnDemandClient; config: OnDemandConfig }
  publicUrl: string
  logRequests?: boolean
}

export function createApp(deps: AppDependencies) {
  const app = new Hono()

  if (deps.logRequests ?? true) {
    app.use('*', requestLogger())
  }

  app.route('/', createAgentRoutes(deps))
  app.route('/api/v1/search', createSearchRoutes(deps))
  app.route('/api/v1/leads', createLeadRoutes(deps))
  app.route('/api/v1/ondemand', createOnDemandRoutes(deps.ondemand))

  /**
   * GET /health
   * Maps provider health plus which integrations are configured
   */
  app.get('/health', async (c) => {
    const maps = deps.capability ? await deps.capability.healthCheck() : false
    const leadStore = deps.leadRepository ? await deps.leadRepository.healthCheck() : false

    return c.json({
      success: true,
      status: maps ? 'healthy' : 'degraded',
      providers: {
        google: maps,
      },
      integrations: {
        maps_api: deps.capability !== null,
        lead_store: deps.leadRepository !== null,
        lead_store_reachable: leadStore,
        ondemand: deps.ondemand.client.enabled,
        language_model: deps.agent.usesLanguageModel,
      },
    })
  })

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404))

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ success: false, error: error.message }, error.status)
    }
    logger.error('Unhandled error', errorMessage(error))
    return c.json({ success: false, error: 'Internal server error', message: error.message }, 500)
  })

  return app
}
