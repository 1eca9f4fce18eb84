import type { NotionService } from '@services/notion.service.js'
import { and, dateBefore, equals } from '@services/notion/filters.js'
import { formatProperties } from '@services/notion/property-formatter.js'
import type { SonarrService } from '@services/sonarr.service.js'
import type { YoutubeService } from '@services/youtube.service.js'
import type { NotionProperties } from '@root/types/notion.types.js'
import type { SonarrEpisode, SonarrSeries } from '@root/types/sonarr.types.js'
import type { ChannelStats } from '@root/types/youtube.types.js'
import { calendarWindow, type DateWindow } from '@utils/date.js'
import {
  DatabaseNotResolvedError,
  errorMessage,
  YoutubeError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface DashboardSyncConfig {
  parentPageId: string
  calendarDatabase: string
  channelStatsDatabase: string
  pastDays: number
  futureDays: number
  /** Channel id, handle, username or URL */
  youtubeChannel: string
}

export interface CatalogSyncSummary {
  window: DateWindow
  entries: number
  created: number
  updated: number
  skipped: number
  failed: number
  staleRemoved: number
}

export interface ChannelStatsSyncSummary {
  channelId: string
  cleared: number
  rowId: string
  stats: ChannelStats
}

/** Column names of the dashboard tables */
export const CALENDAR_COLUMNS = {
  name: 'Name',
  showTitle: 'Show Title',
  date: 'Date',
  episodeId: 'Episode ID',
  poster: 'Poster',
} as const

export const CHANNEL_STATS_COLUMNS = {
  name: 'Name',
  subscribers: 'Subscribers',
  views: 'Views',
  videos: 'Videos',
  updated: 'Updated',
} as const

const posterUrl = (show: SonarrSeries): string | undefined =>
  show.images?.find((image) => image.coverType === 'poster')?.remoteUrl

/**
 * Row of the calendar table for one upcoming episode.
 */
export function buildCalendarRow(
  show: SonarrSeries,
  episode: SonarrEpisode & { airDate: string },
): NotionProperties {
  const poster = posterUrl(show)
  return formatProperties({
    [CALENDAR_COLUMNS.name]: { type: 'title', value: show.title },
    [CALENDAR_COLUMNS.showTitle]: {
      type: 'rich_text',
      value: `${show.title} - S${episode.seasonNumber}E${episode.episodeNumber}: ${episode.title}`,
    },
    [CALENDAR_COLUMNS.date]: { type: 'date', value: episode.airDate },
    [CALENDAR_COLUMNS.episodeId]: { type: 'number', value: episode.id },
    ...(poster
      ? { [CALENDAR_COLUMNS.poster]: { type: 'files', value: poster } }
      : {}),
  })
}

export function buildChannelStatsRow(
  stats: ChannelStats,
  now: Date,
): NotionProperties {
  return formatProperties({
    [CHANNEL_STATS_COLUMNS.name]: { type: 'title', value: stats.title },
    [CHANNEL_STATS_COLUMNS.subscribers]: {
      type: 'number',
      value: stats.subscriberCount,
    },
    [CHANNEL_STATS_COLUMNS.views]: { type: 'number', value: stats.viewCount },
    [CHANNEL_STATS_COLUMNS.videos]: { type: 'number', value: stats.videoCount },
    [CHANNEL_STATS_COLUMNS.updated]: { type: 'date', value: now },
  })
}

const hasAirDate = (
  episode: SonarrEpisode,
): episode is SonarrEpisode & { airDate: string } => Boolean(episode.airDate)

/**
 * Periodic sync of the Notion dashboard tables. Both passes are idempotent
 * and run their steps strictly in sequence.
 */
export class DashboardSyncService {
  /** Resolved once from the configured channel input */
  private channelId: string | null = null

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: DashboardSyncConfig,
    private readonly sonarr: SonarrService,
    private readonly notion: NotionService,
    private readonly youtube: YoutubeService,
  ) {}

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'DASHBOARD_SYNC')
  }

  private async databaseId(title: string): Promise<string> {
    try {
      return this.notion.getDatabaseId(title)
    } catch (error) {
      if (!(error instanceof DatabaseNotResolvedError)) {
        throw error
      }
      await this.notion.warmDatabases(this.config.parentPageId)
      return this.notion.getDatabaseId(title)
    }
  }

  /**
   * Brings the calendar table in line with Sonarr's calendar window: rows
   * dated before the window are removed, then each entry is upserted by
   * episode id and air date. An entry that fails is logged and skipped.
   */
  async syncCatalog(now: Date = new Date()): Promise<CatalogSyncSummary> {
    const { pastDays, futureDays, calendarDatabase } = this.config
    const window = calendarWindow(pastDays, futureDays, now)
    this.log.info(
      `Starting catalog sync for ${window.start} to ${window.end}`,
    )

    const databaseId = await this.databaseId(calendarDatabase)
    const entries = await this.sonarr.getEpisodesCalendar(
      pastDays,
      futureDays,
      now,
    )
    const staleRemoved = await this.notion.deleteRowsWhere(
      databaseId,
      dateBefore(CALENDAR_COLUMNS.date, window.start),
    )

    const summary: CatalogSyncSummary = {
      window,
      entries: entries.length,
      created: 0,
      updated: 0,
      skipped: 0,
      failed: 0,
      staleRemoved,
    }

    for (const entry of entries) {
      if (!hasAirDate(entry)) {
        this.log.warn(`Skipping episode ${entry.id} without an air date`)
        summary.skipped++
        continue
      }

      try {
        const show = await this.sonarr.getSeriesById(entry.seriesId)
        if (!show) {
          this.log.warn(
            `Skipping episode ${entry.id}: series ${entry.seriesId} not found`,
          )
          summary.skipped++
          continue
        }

        const result = await this.notion.createOrUpdateRow(
          databaseId,
          buildCalendarRow(show, entry),
          and(
            equals(CALENDAR_COLUMNS.episodeId, 'number', entry.id),
            equals(CALENDAR_COLUMNS.date, 'date', entry.airDate),
          ),
        )
        summary[result.action]++
      } catch (error) {
        this.log.error(
          { error },
          `Failed to sync episode ${entry.id} of series ${entry.seriesId}: ${errorMessage(error)}`,
        )
        summary.failed++
      }
    }

    this.log.info(
      { summary },
      `Catalog sync complete: ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.failed} failed`,
    )
    return summary
  }

  private async resolveChannel(): Promise<string> {
    if (this.channelId) {
      return this.channelId
    }
    const channelId = await this.youtube.resolveChannelId(
      this.config.youtubeChannel,
    )
    if (!channelId) {
      throw new YoutubeError(
        `Channel not found: ${this.config.youtubeChannel}`,
        404,
      )
    }
    this.channelId = channelId
    return channelId
  }

  /**
   * Replaces the single row of the channel-stats table with fresh numbers.
   */
  async syncChannelStats(
    now: Date = new Date(),
  ): Promise<ChannelStatsSyncSummary> {
    const channelId = await this.resolveChannel()
    const stats = await this.youtube.getChannelStats(channelId)
    if (!stats) {
      throw new YoutubeError(`Channel not found: ${channelId}`, 404)
    }

    const databaseId = await this.databaseId(this.config.channelStatsDatabase)
    const cleared = await this.notion.clearDatabase(databaseId)
    const { id } = await this.notion.createOrUpdateRow(
      databaseId,
      buildChannelStatsRow(stats, now),
    )

    this.log.info(
      `Channel stats synced for ${stats.title}: ${stats.subscriberCount} subscribers, ${stats.viewCount} views, ${stats.videoCount} videos`,
    )
    return { channelId, cleared, rowId: id, stats }
  }
}
