import { Hono } from 'hono'
import { z } from 'zod'
import type { OnDemandClient } from '../services/ondemand.service.js'
import { describeUseCases, getAgentInfo, type OnDemandConfig } from '../config/ondemand.js'
import { validateBody } from '../middleware/validator.js'

const invokeSchema = z.object({
  input: z.record(z.unknown()),
  async: z.boolean().optional(),
  timeout: z.number().positive().optional(),
})

export interface OnDemandRouteDeps {
  client: OnDemandClient
  config: OnDemandConfig
}

export function createOnDemandRoutes({ client, config }: OnDemandRouteDeps) {
  const ondemand = new Hono()

  /**
   * GET /api/v1/ondemand/use-cases
   * Platform agents we can delegate to
   */
  ondemand.get('/use-cases', (c) =>
    c.json({
      success: true,
      enabled: client.enabled,
      use_cases: describeUseCases(config),
    })
  )

  /**
   * POST /api/v1/ondemand/:useCase
   * Invoke the platform agent behind a use case
   */
  ondemand.post('/:useCase', validateBody(invokeSchema), async (c) => {
    const useCase = c.req.param('useCase')
    const info = getAgentInfo(config, useCase)
    if (!info) {
      return c.json({ success: false, error: `Unknown use case: ${useCase}` }, 404)
    }

    const { input, async: asyncMode, timeout } = c.req.valid('json')
    const response = await client.invoke(info.agentId, input, {
      asyncMode,
      timeoutSeconds: timeout,
    })

    return c.json({ success: true, use_case: useCase, agent_id: info.agentId, response })
  })

  return ondemand
}
