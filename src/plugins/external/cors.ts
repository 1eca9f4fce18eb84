import fp from 'fastify-plugin'
import cors from '@fastify/cors'
import type { FastifyInstance } from 'fastify'
import type { FastifyCorsOptions } from '@fastify/cors'

/**
 * Browser access is limited to the public base URL and direct access on the
 * listen port; Sonarr's webhook calls are server to server and unaffected.
 */
const createCorsConfig = (fastify: FastifyInstance): FastifyCorsOptions => {
  const { protocol, hostname } = new URL(fastify.config.baseUrl)
  const { port } = fastify.config

  const origins = new Set([
    `${protocol}//${hostname}`,
    `${protocol}//${hostname}:${port}`,
    `http://localhost:${port}`,
    `http://127.0.0.1:${port}`,
  ])

  return {
    origin: [...origins],
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Origin', 'Content-Type', 'Accept', 'X-API-Key'],
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(cors, createCorsConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
