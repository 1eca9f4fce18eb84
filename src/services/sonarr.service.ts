import type { CatalogCache } from '@services/sonarr/catalog-cache.js'
import {
  found,
  type LookupResult,
  lookupFailed,
  notFound,
  unwrapLookup,
} from '@root/types/service-result.types.js'
import type {
  CachedSeason,
  SonarrClientConfig,
  SonarrEpisode,
  SonarrSeries,
} from '@root/types/sonarr.types.js'
import { parseArrErrorResponse } from '@utils/arr-error.js'
import { calendarWindow } from '@utils/date.js'
import { SonarrError, toError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

/** Series whose episode lists are fetched in parallel during warm-up */
const WARMUP_CONCURRENCY = 4

const byEpisodeOrder = (a: SonarrEpisode, b: SonarrEpisode): number =>
  a.seasonNumber - b.seasonNumber || a.episodeNumber - b.episodeNumber

/**
 * Groups a series' episodes into season entries, ordered by episode number.
 */
export function groupEpisodesBySeason(
  seriesId: number,
  episodes: SonarrEpisode[],
): Map<number, CachedSeason> {
  const seasons = new Map<number, CachedSeason>()
  for (const episode of [...episodes].sort(byEpisodeOrder)) {
    const season = seasons.get(episode.seasonNumber) ?? {
      seriesId,
      seasonNumber: episode.seasonNumber,
      episodeCount: 0,
      episodes: [],
    }
    season.episodes.push(episode)
    season.episodeCount = season.episodes.length
    seasons.set(episode.seasonNumber, season)
  }
  return seasons
}

export class SonarrService {
  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: SonarrClientConfig,
    private readonly cache: CatalogCache,
  ) {}

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SONARR')
  }

  private ensureUrlHasProtocol(url: string): string {
    return url.match(/^https?:\/\//) ? url : `http://${url}`
  }

  private mapConnectionErrorToMessage(error: Error): string {
    // Prefer undici/Node fetch cause codes when available
    const cause = error.cause
    const code =
      typeof cause === 'object' &&
      cause !== null &&
      'code' in cause &&
      typeof cause.code === 'string'
        ? cause.code
        : undefined
    if (code === 'ECONNREFUSED') {
      return 'Connection refused. Please check if Sonarr is running and the URL is correct.'
    }
    if (code === 'ENOTFOUND') {
      return 'Server not found. Please check your base URL.'
    }
    if (code === 'ETIMEDOUT') {
      return 'Connection timeout. Please check your network and firewall settings.'
    }
    if (code === 'ECONNRESET') {
      return 'Connection was reset. Please check your network stability.'
    }
    return `Network error: ${error.message}`
  }

  private buildUrl(
    endpoint: string,
    params?: Record<string, string | number>,
  ): URL {
    const base = this.ensureUrlHasProtocol(this.config.baseUrl).replace(
      /\/+$/,
      '',
    )
    const url = new URL(`${base}/api/v3/${endpoint}`)
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value))
    }
    return url
  }

  /**
   * Single GET against the Sonarr v3 API.
   *
   * @throws SonarrError on connection failures and non-2xx responses; the
   *   HTTP status is kept on the error
   */
  private async getFromSonarr<T>(
    endpoint: string,
    params?: Record<string, string | number>,
  ): Promise<T> {
    const url = this.buildUrl(endpoint, params)

    let response: Response
    try {
      response = await fetch(url.toString(), {
        method: 'GET',
        headers: {
          'X-Api-Key': this.config.apiKey,
          Accept: 'application/json',
        },
      })
    } catch (error) {
      const err = toError(error)
      throw new SonarrError(this.mapConnectionErrorToMessage(err), undefined, {
        cause: err,
      })
    }

    if (!response.ok) {
      const errorData: unknown = await response.json().catch(() => null)
      const errorDetail = parseArrErrorResponse(errorData) || response.statusText

      if (response.status === 401) {
        throw new SonarrError('Authentication failed. Check API key.', 401)
      }
      throw new SonarrError(
        `Sonarr API error: ${errorDetail}`,
        response.status,
      )
    }

    return response.json() as Promise<T>
  }

  /**
   * GET for a single entity. A 404 is a normal answer, not a failure.
   */
  private async lookupFromSonarr<T>(
    endpoint: string,
  ): Promise<LookupResult<T>> {
    try {
      return found(await this.getFromSonarr<T>(endpoint))
    } catch (error) {
      if (error instanceof SonarrError && error.status === 404) {
        return notFound()
      }
      return lookupFailed(toError(error))
    }
  }

  /**
   * Fetches the full series listing, marks the cache fresh and drops cached
   * shows that no longer exist upstream.
   */
  async refreshCatalog(): Promise<SonarrSeries[]> {
    const series = await this.getFromSonarr<SonarrSeries[]>('series')
    this.cache.bulkUpdateShows(series)

    const upstreamIds = new Set(series.map((show) => show.id))
    const removed = this.cache
      .getShows()
      .filter((show) => !upstreamIds.has(show.id))
    for (const show of removed) {
      this.cache.removeShow(show.id)
    }
    if (removed.length > 0) {
      this.log.info(
        { removed: removed.map((show) => show.id) },
        `Removed ${removed.length} series no longer present in Sonarr`,
      )
    }

    return series
  }

  /**
   * Show by id: cache first, then a full refresh when the catalog is stale,
   * then a single-entity fetch.
   *
   * @returns null when Sonarr has no such series
   */
  async getSeriesById(seriesId: number): Promise<SonarrSeries | null> {
    const cached = this.cache.getShow(seriesId)
    if (cached) {
      return cached
    }

    if (this.cache.needsUpdate()) {
      await this.refreshCatalog()
      const refreshed = this.cache.getShow(seriesId)
      if (refreshed) {
        return refreshed
      }
    }

    const result = await this.lookupFromSonarr<SonarrSeries>(
      `series/${seriesId}`,
    )
    if (result.status === 'not_found') {
      this.log.debug(`Series ${seriesId} not found in Sonarr`)
    }
    const series = unwrapLookup(result)
    if (series) {
      this.cache.updateShow(series)
    }
    return series
  }

  async getSeries(): Promise<SonarrSeries[]> {
    if (this.cache.needsUpdate()) {
      this.log.info('Catalog cache is stale, refreshing series listing')
      return this.refreshCatalog()
    }
    return this.cache.getShows()
  }

  private async fetchEpisodes(seriesId: number): Promise<SonarrEpisode[]> {
    return this.getFromSonarr<SonarrEpisode[]>('episode', { seriesId })
  }

  /**
   * Episodes of one season, from the season cache or rebuilt from the
   * series' episode list.
   */
  async getSeasonBySeriesId(
    seriesId: number,
    seasonNumber: number,
  ): Promise<SonarrEpisode[]> {
    const cached = this.cache.getSeason(seriesId, seasonNumber)
    if (cached) {
      return cached.episodes
    }

    const seasons = groupEpisodesBySeason(
      seriesId,
      await this.fetchEpisodes(seriesId),
    )
    const season = seasons.get(seasonNumber)
    if (!season) {
      return []
    }

    this.cache.updateSeason(seriesId, seasonNumber, season)
    for (const episode of season.episodes) {
      this.cache.updateEpisode(
        seriesId,
        seasonNumber,
        episode.episodeNumber,
        episode,
      )
    }
    return season.episodes
  }

  /**
   * Every episode of a series, ordered by season and episode. Refreshes all
   * of that series' season and episode entries.
   */
  async getEpisodesBySeriesId(seriesId: number): Promise<SonarrEpisode[]> {
    const episodes = await this.fetchEpisodes(seriesId)
    const seasons = groupEpisodesBySeason(seriesId, episodes)
    this.cache.bulkUpdateSeasons(seasons.values())
    this.cache.bulkUpdateEpisodes(seriesId, episodes)
    return [...episodes].sort(byEpisodeOrder)
  }

  /**
   * Raw calendar entries in `[now - pastDays, now + futureDays]`. The cache
   * is not touched.
   */
  async getEpisodesCalendar(
    pastDays: number,
    futureDays: number,
    now: Date = new Date(),
  ): Promise<SonarrEpisode[]> {
    const { start, end } = calendarWindow(pastDays, futureDays, now)
    return this.getFromSonarr<SonarrEpisode[]>('calendar', { start, end })
  }

  /**
   * Pre-warms shows, seasons and episodes. The first failure is propagated.
   */
  async initializeCache(): Promise<void> {
    const series = await this.refreshCatalog()
    const limit = pLimit(WARMUP_CONCURRENCY)

    const results = await Promise.all(
      series.map((show) =>
        limit(async () => {
          const episodes = await this.fetchEpisodes(show.id)
          const seasons = groupEpisodesBySeason(show.id, episodes)
          this.cache.bulkUpdateSeasons(seasons.values())
          this.cache.bulkUpdateEpisodes(show.id, episodes)
          return episodes.length
        }),
      ),
    )

    const episodeCount = results.reduce((sum, count) => sum + count, 0)
    this.log.info(
      `Initialized catalog cache with ${series.length} series and ${episodeCount} episodes`,
    )
  }
}
