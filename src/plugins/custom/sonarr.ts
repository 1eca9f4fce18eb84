import { SonarrService } from '@services/sonarr.service.js'
import { CatalogCache } from '@services/sonarr/catalog-cache.js'
import { SonarrWebhookReconciler } from '@services/sonarr/webhook-reconciler.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    catalogCache: CatalogCache
    sonarr: SonarrService
    webhookReconciler: SonarrWebhookReconciler
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const cache = new CatalogCache(fastify.log, {
      ttlHours: fastify.config.catalogCacheTtlHours,
    })
    const service = new SonarrService(
      fastify.log,
      {
        baseUrl: fastify.config.sonarrBaseUrl,
        apiKey: fastify.config.sonarrApiKey,
      },
      cache,
    )

    fastify.decorate('catalogCache', cache)
    fastify.decorate('sonarr', service)
    fastify.decorate('webhookReconciler', new SonarrWebhookReconciler(fastify.log, cache))

    fastify.addHook('onReady', async () => {
      if (!fastify.config.warmCacheOnStartup) {
        return
      }
      try {
        await service.initializeCache()
      } catch (error) {
        fastify.log.error({ error }, 'Failed to warm the Sonarr catalog cache')
        throw error
      }
    })

    fastify.addHook('onClose', () => {
      cache.clear()
    })
  },
  {
    name: 'sonarr',
    dependencies: ['config'],
  },
)
