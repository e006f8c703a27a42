import { zValidator } from '@hono/zod-validator'
import type { ZodSchema } from 'zod'

/**
 * Validate the JSON body against a zod schema; handlers read it with `c.req.valid('json')`
 */
export const validateBody = <T extends ZodSchema>(schema: T) =>
  zValidator('json', schema, (result, c) => {
    if (!result.success) {
      return c.json(
        {
          success: false,
          error: 'Invalid request body',
          issues: result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
        400
      )
    }
  })
