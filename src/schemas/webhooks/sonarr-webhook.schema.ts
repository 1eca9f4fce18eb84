/**
 * Sonarr Webhook Payload Schemas
 *
 * The envelope is validated loosely so that any JSON object reaches the
 * reconciler; `series` and `episodes[0]` are parsed separately for the
 * events that touch the cache.
 */

import { z } from 'zod'

export const WebhookImageSchema = z.object({
  coverType: z.string(),
  url: z.string().optional(),
  remoteUrl: z.string().optional(),
})

export const WebhookSeriesSchema = z
  .object({
    id: z.number().int().positive(),
    title: z.string(),
    images: z.array(WebhookImageSchema).optional(),
    tvdbId: z.number().optional(),
    path: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough()

export const WebhookEpisodeSchema = z.object({
  id: z.number().optional(),
  seasonNumber: z.number().int().nonnegative().optional(),
  episodeNumber: z.number().int().nonnegative().optional(),
  title: z.string().optional(),
  airDate: z.string().optional(),
  airDateUtc: z.string().optional(),
})

export const SonarrWebhookPayloadSchema = z
  .object({
    eventType: z.string().optional(),
    series: z.unknown().optional(),
    episodes: z.array(z.unknown()).optional(),
  })
  .passthrough()

export const WebhookResponseSchema = z.object({
  status: z.literal('success'),
})

export type SonarrWebhookPayload = z.infer<typeof SonarrWebhookPayloadSchema>
export type WebhookResponse = z.infer<typeof WebhookResponseSchema>
