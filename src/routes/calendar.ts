import {
  CalendarQuerySchema,
  EpisodeListResponseSchema,
} from '@schemas/catalog/catalog.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/calendar',
    {
      schema: {
        summary: 'Upcoming episodes',
        operationId: 'getCalendar',
        description:
          'Sonarr calendar entries from past_days ago to future_days ahead',
        querystring: CalendarQuerySchema,
        response: {
          200: EpisodeListResponseSchema,
          502: ErrorSchema,
        },
        tags: ['Calendar'],
      },
    },
    async (request) => {
      const { past_days: pastDays, future_days: futureDays } = request.query
      const episodes = await fastify.sonarr.getEpisodesCalendar(
        pastDays,
        futureDays,
      )
      return { status: 'success' as const, data: episodes }
    },
  )
}

export default plugin
