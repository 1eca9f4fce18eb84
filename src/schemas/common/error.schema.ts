import { z } from 'zod'

// Error envelope shared by every route and the global handlers
export const ErrorSchema = z.object({
  status: z.literal('error'),
  code: z.string(),
  message: z.string().min(1),
})

export type ErrorResponse = z.infer<typeof ErrorSchema>

export const errorResponse = (code: string, message: string): ErrorResponse => ({
  status: 'error',
  code,
  message,
})
