/**
 * Webhook Event Reconciler
 *
 * Applies Sonarr webhook events to the catalog cache without a full refresh.
 * Every event is handled on its own; nothing is thrown back to the route,
 * since Sonarr retries deliveries that fail.
 */

import {
  SonarrWebhookPayloadSchema,
  WebhookEpisodeSchema,
  WebhookSeriesSchema,
} from '@root/schemas/webhooks/sonarr-webhook.schema.js'
import type { CatalogCache } from '@services/sonarr/catalog-cache.js'
import type {
  CatalogEpisode,
  SonarrSeries,
  WebhookOutcome,
} from '@root/types/sonarr.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

type Payload = {
  eventType: string
  series?: unknown
  episodes?: unknown[]
}

export class SonarrWebhookReconciler {
  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly cache: CatalogCache,
  ) {}

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SONARR_WEBHOOK')
  }

  /**
   * Applies one webhook delivery to the cache.
   */
  handle(body: unknown): WebhookOutcome {
    try {
      const parsed = SonarrWebhookPayloadSchema.safeParse(body)
      if (!parsed.success) {
        this.log.error(
          { issues: parsed.error.issues },
          'Received webhook with an invalid payload',
        )
        return { action: 'dropped', reason: 'invalid payload' }
      }

      const { eventType } = parsed.data
      if (!eventType) {
        this.log.error('Received webhook with no eventType')
        return { action: 'dropped', reason: 'missing eventType' }
      }

      this.log.info(`Received Sonarr webhook event: ${eventType}`)
      this.log.debug({ event: parsed.data }, 'Webhook event data')

      const payload: Payload = { ...parsed.data, eventType }
      switch (eventType) {
        case 'Download':
          return this.handleDownload(payload)
        case 'Grab':
          return this.handleGrab(payload)
        case 'Rename':
          return this.handleRename(payload)
        case 'Test':
          this.log.info('Received test notification from Sonarr')
          return { action: 'logged', eventType }
        default:
          this.log.warn(`Unhandled event type: ${eventType}`)
          return { action: 'ignored', eventType }
      }
    } catch (error) {
      this.log.error({ error }, 'Error processing webhook')
      return { action: 'dropped', reason: 'processing error' }
    }
  }

  private parseSeries(payload: Payload): SonarrSeries | null {
    const result = WebhookSeriesSchema.safeParse(payload.series)
    if (!result.success) {
      this.log.warn(
        { issues: result.error.issues },
        `${payload.eventType} event has no usable series`,
      )
      return null
    }
    return result.data
  }

  private parseFirstEpisode(payload: Payload): CatalogEpisode | null {
    const result = WebhookEpisodeSchema.safeParse(payload.episodes?.[0])
    if (!result.success) {
      return null
    }
    const { seasonNumber, episodeNumber } = result.data
    if (seasonNumber === undefined || episodeNumber === undefined) {
      return null
    }
    return { ...result.data, seasonNumber, episodeNumber }
  }

  private handleDownload(payload: Payload): WebhookOutcome {
    const series = this.parseSeries(payload)
    if (!series) {
      return { action: 'dropped', reason: 'missing series' }
    }

    this.cache.updateShow(series)

    const episode = this.parseFirstEpisode(payload)
    if (!episode) {
      this.log.info(`Download completed: ${series.title}`)
      return {
        action: 'cached',
        eventType: payload.eventType,
        seriesId: series.id,
        episodes: 0,
      }
    }

    this.cache.updateEpisode(
      series.id,
      episode.seasonNumber,
      episode.episodeNumber,
      episode,
    )
    this.log.info(
      `Download completed: ${series.title} - S${episode.seasonNumber}E${episode.episodeNumber}`,
    )
    return {
      action: 'cached',
      eventType: payload.eventType,
      seriesId: series.id,
      episodes: 1,
    }
  }

  private handleGrab(payload: Payload): WebhookOutcome {
    const series = WebhookSeriesSchema.safeParse(payload.series)
    const episode = WebhookEpisodeSchema.safeParse(payload.episodes?.[0])
    this.log.info(
      `Episode grabbed: ${series.success ? series.data.title : 'unknown series'} - ${
        episode.success && episode.data.title ? episode.data.title : 'unknown episode'
      }`,
    )
    return { action: 'logged', eventType: payload.eventType }
  }

  private handleRename(payload: Payload): WebhookOutcome {
    const series = this.parseSeries(payload)
    if (!series) {
      return { action: 'dropped', reason: 'missing series' }
    }
    this.cache.updateShow(series)
    this.log.info(`Rename event for series: ${series.title}`)
    return {
      action: 'cached',
      eventType: payload.eventType,
      seriesId: series.id,
      episodes: 0,
    }
  }
}
