import { z } from 'zod'

export const CacheStatsSchema = z.object({
  shows: z.number().int().nonnegative(),
  seasons: z.number().int().nonnegative(),
  episodes: z.number().int().nonnegative(),
  lastFullUpdate: z.string().datetime().nullable(),
  stale: z.boolean(),
})

export const HealthCheckResponseSchema = z.object({
  status: z.literal('healthy'),
  timestamp: z.string().datetime(),
  cache: CacheStatsSchema,
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
