// MUST load .env FIRST before any other imports
import { config } from 'dotenv'
config({ override: true }) // Override shell env vars

import { z } from 'zod'

// Environment variable schema
const envSchema = z.object({
  // Server
  PORT: z.string().default('8081').transform(Number),
  HOST: z.string().default('0.0.0.0'),
  PUBLIC_URL: z.string().url().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Google Maps Places
  GOOGLE_MAPS_API_KEY: z.string().optional(),
  PAGE_DELAY_MS: z.string().default('2000').transform(Number),

  // Optional: lead storage
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

  // Optional: language model (OpenAI-compatible, OpenRouter by default)
  OPENROUTER_API_KEY: z.string().optional(),
  OPENAI_API_BASE: z.string().url().default('https://openrouter.ai/api/v1'),
  MODEL: z.string().default('google/gemini-2.0-flash-lite-001'),
  TEMPERATURE: z.string().default('0.2').transform(Number),

  // Optional: On-demand agent platform
  ONDEMAND_API_KEY: z.string().default(''),
  ONDEMAND_API_BASE: z.string().url().default('https://api.ondemand.io/v1'),
  ONDEMAND_WORKSPACE_ID: z.string().default(''),
  ONDEMAND_LEAD_ENRICHMENT_AGENT: z.string().default('agent_enrich_lead_data_v2'),
  ONDEMAND_LEAD_QUALIFIER_AGENT: z.string().default('agent_qualify_b2b_leads_v3'),
  ONDEMAND_EMAIL_COMPOSER_AGENT: z.string().default('agent_compose_outreach_email_v2'),
  ONDEMAND_CALL_SCRIPT_AGENT: z.string().default('agent_generate_call_script_v1'),
  ONDEMAND_DATA_VALIDATOR_AGENT: z.string().default('agent_validate_business_data_v1'),
  ONDEMAND_TIMEOUT: z.string().default('30').transform(Number),
  ONDEMAND_MAX_RETRIES: z.string().default('3').transform(Number),
  ONDEMAND_ENABLE_CACHING: z
    .string()
    .default('true')
    .transform((value) => value.toLowerCase() === 'true'),
})

// Parse and validate environment variables
function parseEnv() {
  try {
    return envSchema.parse(process.env)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:')
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`)
      })
      process.exit(1)
    }
    throw error
  }
}

export const env = parseEnv()

// Type-safe environment variables
export type Env = z.infer<typeof envSchema>
