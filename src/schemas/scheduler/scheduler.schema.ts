import { successEnvelope } from '@schemas/common/success.schema.js'
import { z } from 'zod'

export const IntervalConfigSchema = z.object({
  days: z.number().int().nonnegative().optional(),
  hours: z.number().int().nonnegative().optional(),
  minutes: z.number().int().nonnegative().optional(),
  seconds: z.number().int().nonnegative().optional(),
})

export const CronConfigSchema = z.object({
  expression: z.string().min(1, 'Cron expression is required'),
})

export const JobRunInfoSchema = z.object({
  time: z.string(),
  status: z.enum(['completed', 'failed', 'pending']),
  error: z.string().optional(),
  estimated: z.boolean().optional(),
})

export const JobStatusSchema = z.object({
  name: z.string(),
  type: z.enum(['interval', 'cron']),
  // Cron first: every interval field is optional, so it would match anything
  config: z.union([CronConfigSchema, IntervalConfigSchema]),
  running: z.boolean(),
  last_run: JobRunInfoSchema.nullable(),
  next_run: JobRunInfoSchema.nullable(),
})

export const JobNameParamsSchema = z.object({
  name: z.string().min(1),
})

export const JobListResponseSchema = successEnvelope(z.array(JobStatusSchema))
export const JobRunResponseSchema = successEnvelope(JobRunInfoSchema)

export type JobNameParams = z.infer<typeof JobNameParamsSchema>
