import { YoutubeService } from '@services/youtube.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    youtube: YoutubeService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorate(
      'youtube',
      new YoutubeService(fastify.log, { apiKey: fastify.config.youtubeApiKey }),
    )
  },
  {
    name: 'youtube',
    dependencies: ['config'],
  },
)
