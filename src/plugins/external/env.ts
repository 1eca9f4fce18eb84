import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'
import { validLogLevels } from '@utils/logger.js'
import { Cron } from 'croner'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    // System Config
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 8000,
    },
    host: {
      type: 'string',
      default: '0.0.0.0',
    },
    logLevel: {
      type: 'string',
      enum: validLogLevels,
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    webhookApiKey: {
      type: 'string',
      default: '',
    },
    // Sonarr Config
    sonarrBaseUrl: {
      type: 'string',
      default: 'http://localhost:8989',
    },
    sonarrApiKey: {
      type: 'string',
      default: '',
    },
    catalogCacheTtlHours: {
      type: 'number',
      minimum: 0,
      default: 12,
    },
    warmCacheOnStartup: {
      type: 'boolean',
      default: true,
    },
    // Notion Config
    notionToken: {
      type: 'string',
      default: '',
    },
    notionParentPageId: {
      type: 'string',
      default: '',
    },
    notionCalendarDatabase: {
      type: 'string',
      default: 'Upcoming Episodes',
    },
    notionChannelStatsDatabase: {
      type: 'string',
      default: 'Channel Stats',
    },
    notionMaxConcurrentRequests: {
      type: 'integer',
      minimum: 1,
      default: 3,
    },
    notionMinRequestIntervalMs: {
      type: 'integer',
      minimum: 0,
      default: 334,
    },
    notionMaxRetries: {
      type: 'integer',
      minimum: 0,
      default: 3,
    },
    notionDuplicateMatchPolicy: {
      type: 'string',
      enum: ['update-first', 'update-all', 'error'],
      default: 'update-first',
    },
    // YouTube Config
    youtubeApiKey: {
      type: 'string',
      default: '',
    },
    youtubeChannel: {
      type: 'string',
      default: '',
    },
    // Dashboard Sync Config
    calendarPastDays: {
      type: 'integer',
      minimum: 0,
      default: 7,
    },
    calendarFutureDays: {
      type: 'integer',
      minimum: 0,
      default: 14,
    },
    catalogSyncCron: {
      type: 'string',
      default: '0 0 * * *',
    },
    channelStatsIntervalMinutes: {
      type: 'integer',
      minimum: 1,
      default: 60,
    },
    schedulerEnabled: {
      type: 'boolean',
      default: true,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    try {
      new Cron(fastify.config.catalogSyncCron).nextRun()
    } catch (error) {
      throw new Error(
        `catalogSyncCron is not a valid cron expression: ${fastify.config.catalogSyncCron}`,
        { cause: error },
      )
    }
  },
  {
    name: 'config',
  },
)
