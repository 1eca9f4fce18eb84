import {
  found,
  type LookupResult,
  lookupFailed,
  notFound,
  unwrapLookup,
} from '@root/types/service-result.types.js'
import type {
  ChannelStats,
  YoutubeChannelItem,
  YoutubeClientConfig,
  YoutubeErrorBody,
  YoutubeListResponse,
  YoutubeSearchItem,
} from '@root/types/youtube.types.js'
import { toError, YoutubeError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const DEFAULT_BASE_URL = 'https://www.googleapis.com/youtube/v3'

const CHANNEL_ID_PATTERN = /^UC[\w-]{22}$/

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

/**
 * Channel reference from a channel page URL: the id after `/channel/`, an
 * `@handle`, or the name after `/c/` or `/user/`. Query and trailing tabs
 * such as `/videos` are ignored.
 */
function channelFromUrl(input: string): string | null {
  const href = /^[a-z][a-z\d+.-]*:\/\//i.test(input) ? input : `https://${input}`
  if (!URL.canParse(href)) {
    return null
  }
  const segments = new URL(href).pathname
    .split('/')
    .filter(Boolean)
    .map(decodeSegment)

  const channelIndex = segments.indexOf('channel')
  if (channelIndex >= 0) {
    return segments[channelIndex + 1] ?? null
  }
  const handle = segments.find((segment) => segment.startsWith('@'))
  if (handle) {
    return handle
  }
  const namedIndex = segments.findIndex(
    (segment) => segment === 'c' || segment === 'user',
  )
  if (namedIndex >= 0) {
    return segments[namedIndex + 1] ?? null
  }
  return segments[0] ?? null
}

const isErrorBody = (value: unknown): value is YoutubeErrorBody =>
  typeof value === 'object' && value !== null

const toCount = (value: string | undefined): number => {
  const count = Number(value ?? 0)
  return Number.isFinite(count) ? count : 0
}

export class YoutubeService {
  private readonly baseUrl: string

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: YoutubeClientConfig,
  ) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
  }

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'YOUTUBE')
  }

  private async getFromYoutube<T>(
    endpoint: string,
    params: Record<string, string>,
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}`)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value)
    }
    url.searchParams.set('key', this.config.apiKey)

    let response: Response
    try {
      response = await fetch(url.toString(), {
        headers: { Accept: 'application/json' },
      })
    } catch (error) {
      const err = toError(error)
      throw new YoutubeError(`YouTube request failed: ${err.message}`, undefined, {
        cause: err,
      })
    }

    if (!response.ok) {
      const errorData: unknown = await response.json().catch(() => null)
      const details = isErrorBody(errorData) ? errorData.error : undefined
      throw new YoutubeError(
        `YouTube API error: ${details?.message ?? response.statusText}`,
        response.status,
        { reason: details?.errors?.[0]?.reason },
      )
    }

    return response.json() as Promise<T>
  }

  private async lookupChannel(
    params: Record<string, string>,
  ): Promise<LookupResult<YoutubeChannelItem>> {
    try {
      const response = await this.getFromYoutube<
        YoutubeListResponse<YoutubeChannelItem>
      >('channels', params)
      const [channel] = response.items ?? []
      return channel ? found(channel) : notFound()
    } catch (error) {
      return lookupFailed(toError(error))
    }
  }

  /**
   * Current statistics of a channel.
   *
   * @returns null when no channel has this id
   * @throws YoutubeError on transport or API failures
   */
  async getChannelStats(channelId: string): Promise<ChannelStats | null> {
    const result = await this.lookupChannel({
      part: 'statistics,snippet',
      id: channelId,
    })
    if (result.status === 'error') {
      this.log.error(
        { error: result.error },
        `Failed to fetch statistics for channel ${channelId}`,
      )
    }
    const channel = unwrapLookup(result)
    if (!channel) {
      this.log.warn(`Channel not found: ${channelId}`)
      return null
    }

    return {
      channelId: channel.id,
      title: channel.snippet?.title ?? channelId,
      subscriberCount: toCount(channel.statistics?.subscriberCount),
      videoCount: toCount(channel.statistics?.videoCount),
      viewCount: toCount(channel.statistics?.viewCount),
      publishedAt: channel.snippet?.publishedAt ?? null,
    }
  }

  /**
   * Channel id from a raw `UC…` id, a channel URL, an `@handle` or a legacy
   * username. Tries the handle, then the username, then a channel search.
   *
   * @returns null when nothing matches
   */
  async resolveChannelId(input: string): Promise<string | null> {
    let candidate = input.trim()
    if (CHANNEL_ID_PATTERN.test(candidate)) {
      return candidate
    }

    if (candidate.includes('/')) {
      candidate = channelFromUrl(candidate) ?? ''
      if (CHANNEL_ID_PATTERN.test(candidate)) {
        return candidate
      }
    }

    const name = candidate.replace(/^@/, '')
    if (!name) {
      return null
    }

    const byHandle = unwrapLookup(
      await this.lookupChannel({ part: 'id', forHandle: `@${name}` }),
    )
    if (byHandle) {
      return byHandle.id
    }

    const byUsername = unwrapLookup(
      await this.lookupChannel({ part: 'id', forUsername: name }),
    )
    if (byUsername) {
      return byUsername.id
    }

    const search = await this.getFromYoutube<
      YoutubeListResponse<YoutubeSearchItem>
    >('search', { part: 'id', q: name, type: 'channel', maxResults: '1' })
    const channelId = search.items?.[0]?.id.channelId
    if (!channelId) {
      this.log.warn(`Channel not found: ${input}`)
      return null
    }
    this.log.debug(`Resolved channel ${input} to ${channelId} via search`)
    return channelId
  }
}
