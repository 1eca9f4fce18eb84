export interface SonarrImage {
  coverType: string
  url?: string
  remoteUrl?: string
}

/**
 * A Sonarr series as returned by `series` and `series/{id}`.
 * Fields the service does not read are carried through untouched.
 */
export interface SonarrSeries {
  id: number
  title: string
  images?: SonarrImage[]
  tvdbId?: number
  path?: string
  status?: string
  [field: string]: unknown
}

export interface SonarrEpisode {
  id: number
  seriesId: number
  seasonNumber: number
  episodeNumber: number
  title: string
  airDate?: string
  airDateUtc?: string
  overview?: string
  hasFile?: boolean
  monitored?: boolean
  episodeFileId?: number
}

/**
 * Season entry derived from a series' episode list. Sonarr has no season
 * endpoint of its own.
 */
export interface CachedSeason {
  seriesId: number
  seasonNumber: number
  episodeCount: number
  episodes: SonarrEpisode[]
}

export interface SonarrClientConfig {
  baseUrl: string
  apiKey: string
}

/**
 * Episode as held by the catalog cache. Entries written from a webhook
 * payload may lack the upstream id and air date.
 */
export interface CatalogEpisode {
  id?: number
  seriesId?: number
  seasonNumber: number
  episodeNumber: number
  title?: string
  airDate?: string
  airDateUtc?: string
}

export interface CatalogCacheOptions {
  /** Hours after which a full catalog refresh is required */
  ttlHours: number
}

export interface CatalogCacheStats {
  shows: number
  seasons: number
  episodes: number
  lastFullUpdate: string | null
  stale: boolean
}

/**
 * Episode entry of a webhook payload. Sonarr sends a reduced episode shape,
 * so everything but the title is optional here.
 */
export interface WebhookEpisode {
  id?: number
  seasonNumber?: number
  episodeNumber?: number
  title?: string
  airDate?: string
  airDateUtc?: string
}

export type WebhookOutcome =
  | { action: 'cached'; eventType: string; seriesId: number; episodes: number }
  | { action: 'logged'; eventType: string }
  | { action: 'ignored'; eventType: string }
  | { action: 'dropped'; reason: string }
