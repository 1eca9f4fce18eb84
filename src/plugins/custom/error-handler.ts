import {
  type ErrorResponse,
  errorResponse,
} from '@root/schemas/common/error.schema.js'
import { UpstreamError } from '@utils/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const resolveError = (err: FastifyError): [number, ErrorResponse] => {
  if (err instanceof UpstreamError) {
    return [502, errorResponse('UPSTREAM_ERROR', err.message)]
  }
  if (err.validation) {
    return [400, errorResponse('VALIDATION_ERROR', err.message)]
  }
  const statusCode = err.statusCode ?? 500
  if (statusCode >= 500) {
    return [
      statusCode,
      errorResponse('INTERNAL_SERVER_ERROR', 'Internal Server Error'),
    ]
  }
  return [
    statusCode,
    errorResponse(err.code || 'CLIENT_ERROR', err.message || 'An error occurred'),
  ]
}

/**
 * Global error handler plugin.
 * Replies with the error envelope: upstream failures as 502, schema
 * validation as 400, anything unexpected as 500.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const [statusCode, payload] = resolveError(err)
    // Avoid logging query/params to prevent leaking tokens
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    if (statusCode === 401) {
      request.log.warn(logData, 'Authentication required')
    } else if (statusCode === 502) {
      request.log.error(logData, 'Upstream service error')
    } else if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
