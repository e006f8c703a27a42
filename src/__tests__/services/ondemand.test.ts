import { describe, it, expect, vi } from 'vitest'
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios'
import { OnDemandClient } from '../../services/ondemand.service.js'
import { describeUseCases, getAgentInfo, type OnDemandConfig } from '../../config/ondemand.js'

// ===========================================
// Test Helpers
// ===========================================

const disabledConfig: OnDemandConfig = {
  apiKey: '',
  apiBase: 'https://api.test/v1/',
  workspaceId: '',
  agents: {
    lead_enrichment: 'agent-enrich',
    lead_qualification: 'agent-qualify',
    email_composition: 'agent-email',
    call_script_generation: 'agent-call',
    data_validation: 'agent-validate',
  },
  timeoutSeconds: 30,
  maxRetries: 3,
  enableCaching: true,
}

const enabledConfig: OnDemandConfig = { ...disabledConfig, apiKey: 'test-secret', workspaceId: 'ws-1' }

type Reply = { status: number; data: unknown } | 'network-error'

/**
 * axios instance whose adapter answers from a script of replies, recording each request
 */
function scriptedHttp(replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = []
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config)
    const reply = replies[Math.min(requests.length - 1, replies.length - 1)]
    if (reply === 'network-error') {
      throw new AxiosError('connect ECONNREFUSED', AxiosError.ERR_NETWORK, config)
    }

    const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: '', headers: {}, config }
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      )
    }
    return response
  })

  return { http: axios.create({ adapter }), requests, adapter }
}

// ===========================================
// Tests
// ===========================================

describe('OnDemandClient', () => {
  it('answers with a mock payload while not configured', async () => {
    const { http, adapter } = scriptedHttp([{ status: 200, data: {} }])
    const client = new OnDemandClient(disabledConfig, http)

    const response = await client.enrichLead('Acme', 'acme.test', 'Austin')

    expect(client.enabled).toBe(false)
    expect(adapter).not.toHaveBeenCalled()
    expect(response).toEqual({
      status: 'success',
      agent_id: 'agent-enrich',
      mock: true,
      message: 'On-demand not configured - using mock data',
      result: {
        processed: true,
        input_received: ['company_name', 'domain', 'location'],
        note: 'Configure ONDEMAND_API_KEY and ONDEMAND_WORKSPACE_ID to use real On-demand agents',
      },
    })
  })

  it('posts the input to the agent endpoint', async () => {
    const { http, requests } = scriptedHttp([{ status: 200, data: { status: 'completed', output: 'ok' } }])
    const client = new OnDemandClient(enabledConfig, http)

    const response = await client.composeEmail({ name: 'Acme' }, 'intro')

    expect(response).toEqual({ status: 'completed', output: 'ok' })
    expect(requests).toHaveLength(1)
    const [request] = requests
    expect(request.url).toBe('https://api.test/v1/workspaces/ws-1/agents/agent-email/invoke')
    expect(request.method).toBe('post')
    expect(request.timeout).toBe(30000)
    expect(request.headers.get('Authorization')).toBe('Bearer test-secret')
    expect(request.headers.get('X-OnDemand-Workspace')).toBe('ws-1')
    expect(JSON.parse(String(request.data))).toEqual({
      input: { lead_profile: { name: 'Acme' }, campaign_type: 'intro', tone: 'professional' },
      async: false,
      cache_enabled: true,
    })
  })

  it('passes per-call timeout and async mode', async () => {
    const { http, requests } = scriptedHttp([{ status: 200, data: { accepted: true } }])
    const client = new OnDemandClient(enabledConfig, http)

    await client.invoke('agent-x', { a: 1 }, { timeoutSeconds: 5, asyncMode: true })

    expect(requests[0].timeout).toBe(5000)
    expect(JSON.parse(String(requests[0].data))).toMatchObject({ async: true })
  })

  it('retries server errors and network failures', async () => {
    const { http, requests } = scriptedHttp([
      { status: 503, data: 'busy' },
      'network-error',
      { status: 200, data: { status: 'completed' } },
    ])
    const client = new OnDemandClient(enabledConfig, http)

    const response = await client.validateData({ phone: '555' }, ['phone'])

    expect(response).toEqual({ status: 'completed' })
    expect(requests).toHaveLength(3)
  })

  it('does not retry client errors', async () => {
    const { http, requests } = scriptedHttp([{ status: 401, data: { error: 'bad key' } }])
    const client = new OnDemandClient(enabledConfig, http)

    const response = await client.qualifyLead({ name: 'Acme' }, { size: 'small' })

    expect(requests).toHaveLength(1)
    expect(response).toMatchObject({ mock: true, agent_id: 'agent-qualify' })
  })

  it('gives up after maxRetries attempts', async () => {
    const { http, requests } = scriptedHttp([{ status: 500, data: 'down' }])
    const client = new OnDemandClient(enabledConfig, http)

    const response = await client.generateCallScript({ name: 'Acme' }, 'book a demo')

    expect(requests).toHaveLength(3)
    expect(response).toMatchObject({ mock: true, agent_id: 'agent-call' })
  })

  it('wraps non-object payloads', async () => {
    const { http } = scriptedHttp([{ status: 200, data: [1, 2] }])
    const client = new OnDemandClient(enabledConfig, http)

    expect(await client.invoke('agent-x', {})).toEqual({ result: [1, 2] })
  })
})

describe('use cases', () => {
  it('describes every use case with its agent id', () => {
    const useCases = describeUseCases(disabledConfig)

    expect(Object.keys(useCases)).toEqual([
      'lead_enrichment',
      'lead_qualification',
      'email_composition',
      'call_script_generation',
      'data_validation',
    ])
    expect(useCases.data_validation.usedBy).toEqual(['lead_finder', 'lead_manager', 'sdr'])
  })

  it('looks up a use case by name', () => {
    expect(getAgentInfo(disabledConfig, 'lead_enrichment')?.agentId).toBe('agent-enrich')
    expect(getAgentInfo(disabledConfig, 'toString')).toBeNull()
    expect(getAgentInfo(disabledConfig, 'unknown')).toBeNull()
  })
})
