import { env } from './config/env.js'
import { serve } from '@hono/node-server'
import { createOpenAI } from '@ai-sdk/openai'
import { createApp } from './app.js'
import { createPlaceSearchCapability } from './providers/google.provider.js'
import { BusinessSearchAggregator } from './services/business-search.js'
import { LeadFinderAgent } from './services/agent.js'
import { SupabaseLeadRepository, type LeadRepository } from './services/lead-store.js'
import { OnDemandClient } from './services/ondemand.service.js'
import { onDemandConfigFromEnv } from './config/ondemand.js'
import { createSupabaseClient } from './config/supabase.js'
import { createLogger, setLogLevel } from './utils/logger.js'

setLogLevel(env.LOG_LEVEL)
const logger = createLogger('server')

const capability = createPlaceSearchCapability(env.GOOGLE_MAPS_API_KEY)
if (!capability) {
  logger.warn('GOOGLE_MAPS_API_KEY not set, searches return sample data')
}

const aggregator = new BusinessSearchAggregator({
  capability,
  pageDelayMs: env.PAGE_DELAY_MS,
})

const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_ANON_KEY
let leadRepository: LeadRepository | null = null
if (env.SUPABASE_URL && supabaseKey) {
  leadRepository = new SupabaseLeadRepository(createSupabaseClient(env.SUPABASE_URL, supabaseKey))
} else {
  logger.warn('Supabase not configured, the save_leads skill is disabled')
}

const model = env.OPENROUTER_API_KEY
  ? createOpenAI({ apiKey: env.OPENROUTER_API_KEY, baseURL: env.OPENAI_API_BASE }).chat(env.MODEL)
  : null

const agent = new LeadFinderAgent({
  aggregator,
  leadRepository,
  model,
  temperature: env.TEMPERATURE,
})

const ondemandConfig = onDemandConfigFromEnv(env)
const publicUrl = env.PUBLIC_URL ?? `http://${env.HOST === '0.0.0.0' ? 'localhost' : env.HOST}:${env.PORT}`

const app = createApp({
  capability,
  aggregator,
  agent,
  leadRepository,
  ondemand: { client: new OnDemandClient(ondemandConfig), config: ondemandConfig },
  publicUrl,
})

serve({ fetch: app.fetch, port: env.PORT, hostname: env.HOST }, (info) => {
  logger.info(`Lead finder agent listening on http://${info.address}:${info.port}`)
  logger.info(`Agent card: ${publicUrl}/.well-known/agent.json`)
})
