import {
  EpisodeListResponseSchema,
  EpisodesQuerySchema,
  SeriesListResponseSchema,
  SeriesParamsSchema,
  SeriesResponseSchema,
} from '@schemas/catalog/catalog.schema.js'
import { ErrorSchema, errorResponse } from '@schemas/common/error.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/series',
    {
      schema: {
        summary: 'List series',
        operationId: 'getSeries',
        description:
          'All series from the catalog cache, refreshed from Sonarr when stale',
        response: {
          200: SeriesListResponseSchema,
          502: ErrorSchema,
        },
        tags: ['Sonarr'],
      },
    },
    async () => {
      const series = await fastify.sonarr.getSeries()
      return { status: 'success' as const, data: series }
    },
  )

  fastify.get(
    '/series/:id',
    {
      schema: {
        summary: 'Get series by ID',
        operationId: 'getSeriesById',
        params: SeriesParamsSchema,
        response: {
          200: SeriesResponseSchema,
          404: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Sonarr'],
      },
    },
    async (request, reply) => {
      const { id } = request.params
      const series = await fastify.sonarr.getSeriesById(id)
      if (!series) {
        return reply
          .code(404)
          .send(errorResponse('NOT_FOUND', `Series ${id} not found`))
      }
      return { status: 'success' as const, data: series }
    },
  )

  fastify.get(
    '/series/:id/episodes',
    {
      schema: {
        summary: 'List episodes of a series',
        operationId: 'getSeriesEpisodes',
        description:
          'Episodes of one season when season_number is given, otherwise every episode ordered by season and episode',
        params: SeriesParamsSchema,
        querystring: EpisodesQuerySchema,
        response: {
          200: EpisodeListResponseSchema,
          502: ErrorSchema,
        },
        tags: ['Sonarr'],
      },
    },
    async (request) => {
      const { id } = request.params
      const { season_number: seasonNumber } = request.query
      const episodes =
        seasonNumber === undefined
          ? await fastify.sonarr.getEpisodesBySeriesId(id)
          : await fastify.sonarr.getSeasonBySeriesId(id, seasonNumber)
      return { status: 'success' as const, data: episodes }
    },
  )
}

export default plugin
