import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

const createRateLimitConfig = (fastify: FastifyInstance) => ({
  max: fastify.config.rateLimitMax,
  timeWindow: '1 minute',
  // Container health probes poll frequently
  allowList: (req: FastifyRequest) => req.url.split('?')[0] === '/health',
})

/**
 * Global per-client rate limit. Also provides `fastify.rateLimit()` for the
 * stricter 404 handler.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
