import { HealthCheckResponseSchema } from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Liveness probe with catalog cache counters. Does not require authentication.',
        response: {
          200: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async () => {
      return {
        status: 'healthy' as const,
        timestamp: new Date().toISOString(),
        cache: fastify.catalogCache.stats(),
      }
    },
  )
}

export default plugin
