import type { Env } from './env.js'

export type OnDemandUseCase =
  | 'lead_enrichment'
  | 'lead_qualification'
  | 'email_composition'
  | 'call_script_generation'
  | 'data_validation'

export interface OnDemandConfig {
  apiKey: string
  apiBase: string
  workspaceId: string
  agents: Record<OnDemandUseCase, string>
  timeoutSeconds: number
  maxRetries: number
  enableCaching: boolean
}

export function onDemandConfigFromEnv(env: Env): OnDemandConfig {
  return {
    apiKey: env.ONDEMAND_API_KEY,
    apiBase: env.ONDEMAND_API_BASE,
    workspaceId: env.ONDEMAND_WORKSPACE_ID,
    agents: {
      lead_enrichment: env.ONDEMAND_LEAD_ENRICHMENT_AGENT,
      lead_qualification: env.ONDEMAND_LEAD_QUALIFIER_AGENT,
      email_composition: env.ONDEMAND_EMAIL_COMPOSER_AGENT,
      call_script_generation: env.ONDEMAND_CALL_SCRIPT_AGENT,
      data_validation: env.ONDEMAND_DATA_VALIDATOR_AGENT,
    },
    timeoutSeconds: env.ONDEMAND_TIMEOUT,
    maxRetries: env.ONDEMAND_MAX_RETRIES,
    enableCaching: env.ONDEMAND_ENABLE_CACHING,
  }
}

export function isOnDemandEnabled(config: OnDemandConfig): boolean {
  return Boolean(config.apiKey && config.workspaceId)
}

export function agentEndpoint(config: OnDemandConfig, agentId: string): string {
  return `${config.apiBase.replace(/\/+$/, '')}/workspaces/${config.workspaceId}/agents/${agentId}/invoke`
}

export function onDemandHeaders(config: OnDemandConfig): Record<string, string> {
  return {
    Authorization: `Bearer ${config.apiKey}`,
    'Content-Type': 'application/json',
    'X-OnDemand-Workspace': config.workspaceId,
  }
}

export interface AgentUseCase {
  agentId: string
  description: string
  inputSchema: Record<string, string>
  usedBy: string[]
}

/**
 * Which platform agent serves each task, and which of our agents call it
 */
export function describeUseCases(config: OnDemandConfig): Record<OnDemandUseCase, AgentUseCase> {
  return {
    lead_enrichment: {
      agentId: config.agents.lead_enrichment,
      description: 'Enriches lead data with company size, revenue, tech stack, and decision makers',
      inputSchema: { company_name: 'str', domain: 'str', location: 'str' },
      usedBy: ['lead_finder', 'lead_manager'],
    },
    lead_qualification: {
      agentId: config.agents.lead_qualification,
      description: 'Qualifies leads based on ICP fit, buying signals, and engagement potential',
      inputSchema: { lead_data: 'dict', icp_criteria: 'dict' },
      usedBy: ['lead_manager'],
    },
    email_composition: {
      agentId: config.agents.email_composition,
      description: 'Generates personalized outreach emails based on lead profile and context',
      inputSchema: { lead_profile: 'dict', campaign_type: 'str', tone: 'str' },
      usedBy: ['sdr'],
    },
    call_script_generation: {
      agentId: config.agents.call_script_generation,
      description: 'Creates dynamic call scripts with objection handling for phone outreach',
      inputSchema: { lead_context: 'dict', call_objective: 'str' },
      usedBy: ['sdr'],
    },
    data_validation: {
      agentId: config.agents.data_validation,
      description: 'Validates and cleans business data (emails, phones, addresses)',
      inputSchema: { data: 'dict', validation_rules: 'list' },
      usedBy: ['lead_finder', 'lead_manager', 'sdr'],
    },
  }
}

function isUseCase(value: string, useCases: Record<OnDemandUseCase, AgentUseCase>): value is OnDemandUseCase {
  return Object.prototype.hasOwnProperty.call(useCases, value)
}

export function getAgentInfo(config: OnDemandConfig, useCase: string): AgentUseCase | null {
  const useCases = describeUseCases(config)
  return isUseCase(useCase, useCases) ? useCases[useCase] : null
}
