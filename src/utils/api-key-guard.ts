import { timingSafeEqual } from 'node:crypto'
import { errorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'

const keysMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * preHandler that requires `X-API-Key` to equal `webhookApiKey`. Without a
 * configured key every request passes.
 */
export function createApiKeyGuard(fastify: FastifyInstance) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const expected = fastify.config.webhookApiKey
    if (!expected) {
      return
    }

    const provided = request.headers['x-api-key']
    if (typeof provided === 'string' && keysMatch(provided, expected)) {
      return
    }

    request.log.warn(
      { ip: request.ip, path: request.url.split('?')[0] },
      'Invalid API key authentication attempt',
    )
    return reply
      .code(401)
      .send(errorResponse('UNAUTHORIZED', 'Invalid or missing API key'))
  }
}
