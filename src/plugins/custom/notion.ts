import { NotionService } from '@services/notion.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    notion: NotionService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const service = new NotionService(fastify.log, {
      token: config.notionToken,
      maxConcurrent: config.notionMaxConcurrentRequests,
      minRequestIntervalMs: config.notionMinRequestIntervalMs,
      maxRetries: config.notionMaxRetries,
      duplicateMatchPolicy: config.notionDuplicateMatchPolicy,
    })
    fastify.decorate('notion', service)
  },
  {
    name: 'notion',
    dependencies: ['config'],
  },
)
