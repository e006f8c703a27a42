import axios, { type AxiosInstance } from 'axios'
import { z } from 'zod'
import {
  agentEndpoint,
  isOnDemandEnabled,
  onDemandHeaders,
  type OnDemandConfig,
} from '../config/ondemand.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('ondemand')

export type AgentPayload = Record<string, unknown>

export type MockAgentResponse = {
  status: 'success'
  agent_id: string
  mock: true
  message: string
  result: {
    processed: true
    input_received: string[]
    note: string
  }
}

export interface InvokeOptions {
  timeoutSeconds?: number
  asyncMode?: boolean
}

const payloadSchema = z.record(z.unknown())

/**
 * Client for the On-demand agent platform.
 * Answers with a mock payload while the platform is not configured or a call fails.
 */
export class OnDemandClient {
  private readonly http: AxiosInstance

  constructor(
    private readonly config: OnDemandConfig,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create()
  }

  get enabled(): boolean {
    return isOnDemandEnabled(this.config)
  }

  async invoke(agentId: string, input: AgentPayload, options: InvokeOptions = {}): Promise<AgentPayload> {
    if (!this.enabled) {
      return mockResponse(agentId, input)
    }

    const timeoutSeconds = options.timeoutSeconds ?? this.config.timeoutSeconds
    const body = {
      input,
      async: options.asyncMode ?? false,
      cache_enabled: this.config.enableCaching,
    }
    const attempts = Math.max(1, this.config.maxRetries)

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await this.http.post<unknown>(agentEndpoint(this.config, agentId), body, {
          headers: onDemandHeaders(this.config),
          timeout: timeoutSeconds * 1000,
        })
        const parsed = payloadSchema.safeParse(response.data)
        return parsed.success ? parsed.data : { result: response.data }
      } catch (error) {
        const retryable = isRetryable(error)
        logger.error(`Error invoking agent ${agentId} (attempt ${attempt}/${attempts})`, errorMessage(error))
        if (!retryable) break
      }
    }

    return mockResponse(agentId, input)
  }

  /**
   * Enrich a lead with company data
   */
  enrichLead(companyName: string, domain: string, location: string): Promise<AgentPayload> {
    return this.invoke(this.config.agents.lead_enrichment, {
      company_name: companyName,
      domain,
      location,
    })
  }

  /**
   * Score a lead against ideal-customer-profile criteria
   */
  qualifyLead(leadData: AgentPayload, icpCriteria: AgentPayload): Promise<AgentPayload> {
    return this.invoke(this.config.agents.lead_qualification, {
      lead_data: leadData,
      icp_criteria: icpCriteria,
    })
  }

  composeEmail(leadProfile: AgentPayload, campaignType: string, tone = 'professional'): Promise<AgentPayload> {
    return this.invoke(this.config.agents.email_composition, {
      lead_profile: leadProfile,
      campaign_type: campaignType,
      tone,
    })
  }

  generateCallScript(leadContext: AgentPayload, callObjective: string): Promise<AgentPayload> {
    return this.invoke(this.config.agents.call_script_generation, {
      lead_context: leadContext,
      call_objective: callObjective,
    })
  }

  validateData(data: AgentPayload, validationRules: string[]): Promise<AgentPayload> {
    return this.invoke(this.config.agents.data_validation, {
      data,
      validation_rules: validationRules,
    })
  }
}

// Network errors and 5xx answers are worth another attempt; 4xx are not
function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false
  const status = error.response?.status
  return status === undefined || status >= 500
}

export function mockResponse(agentId: string, input: AgentPayload): MockAgentResponse {
  return {
    status: 'success',
    agent_id: agentId,
    mock: true,
    message: 'On-demand not configured - using mock data',
    result: {
      processed: true,
      input_received: Object.keys(input),
      note: 'Configure ONDEMAND_API_KEY and ONDEMAND_WORKSPACE_ID to use real On-demand agents',
    },
  }
}
