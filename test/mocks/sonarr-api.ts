import type { SonarrEpisode, SonarrSeries } from '@root/types/sonarr.types.js'

export const SONARR_BASE_URL = 'http://sonarr.test'
export const SONARR_API_URL = `${SONARR_BASE_URL}/api/v3`

export function makeSeries(
  id: number,
  title: string,
  overrides: Partial<SonarrSeries> = {},
): SonarrSeries {
  return {
    id,
    title,
    images: [
      {
        coverType: 'poster',
        remoteUrl: `https://artworks.test/posters/${id}.jpg`,
      },
    ],
    tvdbId: 1000 + id,
    status: 'continuing',
    ...overrides,
  }
}

export function makeEpisode(
  seriesId: number,
  seasonNumber: number,
  episodeNumber: number,
  overrides: Partial<SonarrEpisode> = {},
): SonarrEpisode {
  return {
    id: seriesId * 1000 + seasonNumber * 100 + episodeNumber,
    seriesId,
    seasonNumber,
    episodeNumber,
    title: `Episode ${episodeNumber}`,
    ...overrides,
  }
}
