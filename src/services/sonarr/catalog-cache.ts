/**
 * Catalog Cache
 *
 * In-memory store of Sonarr shows, seasons and episodes with a single
 * freshness timestamp.
 *
 * Design:
 * - Point lookups never expire; webhooks keep single entries current
 * - Only bulkUpdateShows() advances freshness
 * - Every operation is synchronous, so a reader never sees a half-applied
 *   update between awaits
 */

import type {
  CachedSeason,
  CatalogCacheOptions,
  CatalogCacheStats,
  CatalogEpisode,
  SonarrSeries,
} from '@root/types/sonarr.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const HOUR_MS = 60 * 60 * 1000

const seasonKey = (seriesId: number, seasonNumber: number): string =>
  `${seriesId}_${seasonNumber}`

const episodeKey = (
  seriesId: number,
  seasonNumber: number,
  episodeNumber: number,
): string => `${seriesId}_${seasonNumber}_${episodeNumber}`

export class CatalogCache {
  private readonly shows = new Map<number, SonarrSeries>()
  private readonly seasons = new Map<string, CachedSeason>()
  private readonly episodes = new Map<string, CatalogEpisode>()
  private lastFullUpdate: number | null = null
  private readonly ttlMs: number

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    options: CatalogCacheOptions,
  ) {
    this.ttlMs = options.ttlHours * HOUR_MS
  }

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'CATALOG_CACHE')
  }

  /**
   * True when the catalog was never refreshed or the last full refresh is
   * older than the configured interval.
   */
  needsUpdate(): boolean {
    if (this.lastFullUpdate === null) {
      return true
    }
    return Date.now() - this.lastFullUpdate > this.ttlMs
  }

  getShow(seriesId: number): SonarrSeries | undefined {
    return this.shows.get(seriesId)
  }

  getShows(): SonarrSeries[] {
    return [...this.shows.values()]
  }

  getSeason(seriesId: number, seasonNumber: number): CachedSeason | undefined {
    return this.seasons.get(seasonKey(seriesId, seasonNumber))
  }

  getEpisode(
    seriesId: number,
    seasonNumber: number,
    episodeNumber: number,
  ): CatalogEpisode | undefined {
    return this.episodes.get(episodeKey(seriesId, seasonNumber, episodeNumber))
  }

  /**
   * Replaces the cached record for the show's id. A show without an id is
   * skipped.
   */
  updateShow(show: SonarrSeries): void {
    if (!show.id) {
      this.log.warn('Attempted to cache show without ID')
      return
    }
    this.shows.set(show.id, show)
    this.log.debug(`Updated show cache for series ${show.id}`)
  }

  updateSeason(
    seriesId: number,
    seasonNumber: number,
    season: CachedSeason,
  ): void {
    const key = seasonKey(seriesId, seasonNumber)
    this.seasons.set(key, season)
    this.log.debug(`Updated season cache for ${key}`)
  }

  updateEpisode(
    seriesId: number,
    seasonNumber: number,
    episodeNumber: number,
    episode: CatalogEpisode,
  ): void {
    const key = episodeKey(seriesId, seasonNumber, episodeNumber)
    this.episodes.set(key, episode)
    this.log.debug(`Updated episode cache for ${key}`)
  }

  /**
   * Upserts many shows and marks the catalog as fresh.
   */
  bulkUpdateShows(shows: Iterable<SonarrSeries>): void {
    let count = 0
    for (const show of shows) {
      if (!show.id) {
        this.log.warn('Skipping show without ID in bulk update')
        continue
      }
      this.shows.set(show.id, show)
      count++
    }
    this.lastFullUpdate = Date.now()
    this.log.info(`Updated ${count} shows in cache`)
  }

  bulkUpdateSeasons(seasons: Iterable<CachedSeason>): void {
    let count = 0
    for (const season of seasons) {
      this.seasons.set(seasonKey(season.seriesId, season.seasonNumber), season)
      count++
    }
    this.log.info(`Updated ${count} seasons in cache`)
  }

  bulkUpdateEpisodes(
    seriesId: number,
    episodes: Iterable<CatalogEpisode>,
  ): void {
    let count = 0
    for (const episode of episodes) {
      this.episodes.set(
        episodeKey(seriesId, episode.seasonNumber, episode.episodeNumber),
        episode,
      )
      count++
    }
    this.log.info(`Updated ${count} episodes in cache`)
  }

  /**
   * Drops a show together with its seasons and episodes.
   *
   * @returns false when the show was not cached
   */
  removeShow(seriesId: number): boolean {
    const existed = this.shows.delete(seriesId)
    const prefix = `${seriesId}_`
    for (const key of this.seasons.keys()) {
      if (key.startsWith(prefix)) this.seasons.delete(key)
    }
    for (const key of this.episodes.keys()) {
      if (key.startsWith(prefix)) this.episodes.delete(key)
    }
    if (existed) {
      this.log.debug(`Removed series ${seriesId} from cache`)
    }
    return existed
  }

  clear(): void {
    this.shows.clear()
    this.seasons.clear()
    this.episodes.clear()
    this.lastFullUpdate = null
    this.log.info('Cleared all cache data')
  }

  stats(): CatalogCacheStats {
    return {
      shows: this.shows.size,
      seasons: this.seasons.size,
      episodes: this.episodes.size,
      lastFullUpdate:
        this.lastFullUpdate === null
          ? null
          : new Date(this.lastFullUpdate).toISOString(),
      stale: this.needsUpdate(),
    }
  }
}
