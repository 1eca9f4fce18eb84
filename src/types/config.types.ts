import type { DuplicateMatchPolicy } from '@root/types/notion.types.js'

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  baseUrl: string
  port: number
  host: string
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  webhookApiKey: string
  // Sonarr Config
  sonarrBaseUrl: string
  sonarrApiKey: string
  catalogCacheTtlHours: number
  warmCacheOnStartup: boolean
  // Notion Config
  notionToken: string
  notionParentPageId: string
  notionCalendarDatabase: string
  notionChannelStatsDatabase: string
  notionMaxConcurrentRequests: number
  notionMinRequestIntervalMs: number
  notionMaxRetries: number
  notionDuplicateMatchPolicy: DuplicateMatchPolicy
  // YouTube Config
  youtubeApiKey: string
  youtubeChannel: string
  // Dashboard Sync Config
  calendarPastDays: number
  calendarFutureDays: number
  catalogSyncCron: string
  channelStatsIntervalMinutes: number
  schedulerEnabled: boolean
}
