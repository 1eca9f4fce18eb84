import { DashboardSyncService } from '@services/dashboard-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    dashboardSync: DashboardSyncService
  }
}

const CATALOG_SYNC_JOB = 'catalog-sync'
const CHANNEL_STATS_SYNC_JOB = 'channel-stats-sync'

/**
 * Dashboard Sync Plugin
 *
 * Registers the catalog sync (cron) and channel stats sync (interval) jobs
 * once the server is ready, and runs each of them once right away.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const service = new DashboardSyncService(
      fastify.log,
      {
        parentPageId: config.notionParentPageId,
        calendarDatabase: config.notionCalendarDatabase,
        channelStatsDatabase: config.notionChannelStatsDatabase,
        pastDays: config.calendarPastDays,
        futureDays: config.calendarFutureDays,
        youtubeChannel: config.youtubeChannel,
      },
      fastify.sonarr,
      fastify.notion,
      fastify.youtube,
    )
    fastify.decorate('dashboardSync', service)

    fastify.addHook('onReady', async () => {
      if (!config.schedulerEnabled) {
        fastify.log.debug('Scheduler disabled, dashboard sync jobs not registered')
        return
      }
      if (!config.notionToken || !config.notionParentPageId) {
        fastify.log.warn(
          'Notion token or parent page not configured, dashboard sync disabled',
        )
        return
      }

      const jobs: string[] = []

      fastify.scheduler.scheduleJob(
        CATALOG_SYNC_JOB,
        async () => {
          await service.syncCatalog()
        },
        { type: 'cron', config: { expression: config.catalogSyncCron } },
      )
      jobs.push(CATALOG_SYNC_JOB)

      if (config.youtubeApiKey && config.youtubeChannel) {
        fastify.scheduler.scheduleJob(
          CHANNEL_STATS_SYNC_JOB,
          async () => {
            await service.syncChannelStats()
          },
          {
            type: 'interval',
            config: { minutes: config.channelStatsIntervalMinutes },
          },
        )
        jobs.push(CHANNEL_STATS_SYNC_JOB)
      } else {
        fastify.log.warn(
          'YouTube API key or channel not configured, channel stats sync disabled',
        )
      }

      // Initial pass; outcomes land in each job's last run
      for (const name of jobs) {
        fastify.scheduler.runJobNow(name).catch((error: unknown) => {
          fastify.log.error({ error }, `Initial run of ${name} failed`)
        })
      }
    })
  },
  {
    name: 'dashboard-sync',
    dependencies: ['config', 'scheduler', 'sonarr', 'notion', 'youtube'],
  },
)
