import { successEnvelope } from '@schemas/common/success.schema.js'
import { WebhookImageSchema } from '@schemas/webhooks/sonarr-webhook.schema.js'
import { z } from 'zod'

// Unread Sonarr fields are passed through as-is
export const SeriesSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    images: z.array(WebhookImageSchema).optional(),
    tvdbId: z.number().optional(),
    path: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough()

export const EpisodeSchema = z.object({
  id: z.number().int(),
  seriesId: z.number().int(),
  seasonNumber: z.number().int(),
  episodeNumber: z.number().int(),
  title: z.string(),
  airDate: z.string().optional(),
  airDateUtc: z.string().optional(),
  overview: z.string().optional(),
  hasFile: z.boolean().optional(),
  monitored: z.boolean().optional(),
})

export const SeriesParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const EpisodesQuerySchema = z.object({
  season_number: z.coerce.number().int().nonnegative().optional(),
})

export const CalendarQuerySchema = z.object({
  past_days: z.coerce.number().int().nonnegative().max(365).default(7),
  future_days: z.coerce.number().int().nonnegative().max(365).default(7),
})

export const SeriesListResponseSchema = successEnvelope(z.array(SeriesSchema))
export const SeriesResponseSchema = successEnvelope(SeriesSchema)
export const EpisodeListResponseSchema = successEnvelope(z.array(EpisodeSchema))

export type SeriesParams = z.infer<typeof SeriesParamsSchema>
export type EpisodesQuery = z.infer<typeof EpisodesQuerySchema>
export type CalendarQuery = z.infer<typeof CalendarQuerySchema>
