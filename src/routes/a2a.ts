import { Hono } from 'hono'
import { z } from 'zod'
import { v4 as uuidv4 } from 'uuid'
import type { LeadFinderAgent } from '../services/agent.js'
import type { BusinessSearchAggregator } from '../services/business-search.js'
import { searchBusinesses } from '../services/lead-search.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('a2a')

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const

export interface AgentSkill {
  id: string
  name: string
  description: string
  examples: string[]
  tags: string[]
}

export interface AgentCard {
  name: string
  description: string
  url: string
  version: string
  capabilities: { streaming: boolean; pushNotifications: boolean }
  defaultInputModes: string[]
  defaultOutputModes: string[]
  skills: AgentSkill[]
}

export function buildAgentCard(agent: LeadFinderAgent, url: string): AgentCard {
  return {
    name: agent.name,
    description: agent.description,
    url,
    version: '1.0.0',
    capabilities: {
      streaming: false,
      pushNotifications: false,
    },
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    skills: [
      {
        id: 'process_search',
        name: 'Search for Leads in a City',
        description:
          "Using Google Maps search, find potential leads among the city's businesses that have no website presence.",
        examples: [
          'Search for potential leads in the technology sector in San Francisco',
          'Find leads in San Francisco',
        ],
        tags: [],
      },
      {
        id: 'save_leads',
        name: 'Save Leads to Database',
        description: 'Saves the found leads to the database for further processing.',
        examples: ['Save leads found in San Francisco', 'Store leads in the database'],
        tags: [],
      },
    ],
  }
}

const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string(),
  params: z.unknown().optional(),
})

const partSchema = z
  .object({
    kind: z.string(),
    text: z.string().optional(),
  })
  .passthrough()

const messageSendParamsSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    messageId: z.string().optional(),
    contextId: z.string().optional(),
    parts: z.array(partSchema).min(1),
  }),
})

type JsonRpcId = string | number | null

function rpcError(id: JsonRpcId, code: number, message: string) {
  return { jsonrpc: '2.0' as const, id, error: { code, message } }
}

export interface AgentRouteDeps {
  agent: LeadFinderAgent
  aggregator: BusinessSearchAggregator
  publicUrl: string
}

/**
 * Agent-to-agent surface: the agent card, the JSON-RPC endpoint and a plain /search endpoint
 */
export function createAgentRoutes({ agent, aggregator, publicUrl }: AgentRouteDeps) {
  const a2a = new Hono()
  const card = buildAgentCard(agent, publicUrl)

  /**
   * GET /.well-known/agent.json
   * Agent card for discovery
   */
  a2a.get('/.well-known/agent.json', (c) => c.json(card))

  /**
   * POST /
   * JSON-RPC 2.0; supports message/send
   */
  a2a.post('/', async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json(rpcError(null, JSON_RPC_ERRORS.PARSE_ERROR, 'Parse error'))
    }

    const request = jsonRpcRequestSchema.safeParse(body)
    if (!request.success) {
      return c.json(rpcError(null, JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid Request'))
    }

    const id = request.data.id ?? null
    if (request.data.method !== 'message/send') {
      return c.json(rpcError(id, JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Method not found: ${request.data.method}`))
    }

    const params = messageSendParamsSchema.safeParse(request.data.params)
    if (!params.success) {
      return c.json(rpcError(id, JSON_RPC_ERRORS.INVALID_PARAMS, 'Invalid params: message with parts is required'))
    }

    const { message } = params.data
    const text = message.parts
      .map((part) => (part.kind === 'text' ? part.text ?? '' : ''))
      .join('\n')
      .trim()

    try {
      const reply = await agent.handle(text)
      return c.json({
        jsonrpc: '2.0' as const,
        id,
        result: {
          kind: 'message' as const,
          role: 'agent' as const,
          messageId: uuidv4(),
          contextId: message.contextId ?? uuidv4(),
          parts: [
            { kind: 'text' as const, text: reply.text },
            ...(reply.data ? [{ kind: 'data' as const, data: reply.data }] : []),
          ],
        },
      })
    } catch (error) {
      logger.error('message/send failed', errorMessage(error))
      return c.json(
        rpcError(id, JSON_RPC_ERRORS.INTERNAL_ERROR, error instanceof Error ? error.message : 'Internal error')
      )
    }
  })

  /**
   * POST /search
   * Plain HTTP search without the JSON-RPC envelope
   */
  a2a.post('/search', async (c) => {
    const body: unknown = await c.req.json().catch(() => null)
    const parsed = z.object({ city: z.string().trim().min(1) }).safeParse(body)
    if (!parsed.success) {
      return c.json({ success: false, error: 'City is required' }, 400)
    }

    const { city } = parsed.data
    logger.info(`Simple search request for city: ${city}`)

    const result = await searchBusinesses(aggregator, { city, max_results: 50 })
    if (result.status === 'error') {
      return c.json({ success: false, error: result.message ?? 'Search failed' }, 500)
    }

    return c.json({
      success: true,
      city,
      businesses: result.results,
      count: result.totalResults,
    })
  })

  return a2a
}
