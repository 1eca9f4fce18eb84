import { z } from 'zod'

/**
 * `{ status: 'success', data }` envelope around a route's payload.
 */
export const successEnvelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    status: z.literal('success'),
    data,
  })
