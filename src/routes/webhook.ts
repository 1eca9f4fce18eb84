import { ErrorSchema } from '@schemas/common/error.schema.js'
import { WebhookResponseSchema } from '@schemas/webhooks/sonarr-webhook.schema.js'
import { createApiKeyGuard } from '@utils/api-key-guard.js'
import type { FastifyRequest } from 'fastify'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

// Empty or unparseable bodies reach the reconciler as-is so that Sonarr
// always gets an acknowledgement
function parseLenient(body: string): unknown {
  if (body.trim() === '') {
    return undefined
  }
  try {
    return JSON.parse(body)
  } catch {
    return body
  }
}

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  // Scoped to this plugin; other routes keep the default JSON parser
  fastify.removeContentTypeParser('application/json')
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string) => parseLenient(body),
  )
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string) => parseLenient(body),
  )

  fastify.post(
    '/webhook',
    {
      preHandler: createApiKeyGuard(fastify),
      schema: {
        summary: 'Sonarr webhook',
        operationId: 'postSonarrWebhook',
        description:
          'Receives Sonarr webhook events and applies them to the catalog cache. Always acknowledged once authenticated.',
        response: {
          200: WebhookResponseSchema,
          401: ErrorSchema,
        },
        tags: ['Webhook'],
      },
    },
    async (request) => {
      const outcome = fastify.webhookReconciler.handle(request.body)
      request.log.debug({ outcome }, 'Sonarr webhook processed')
      return { status: 'success' as const }
    },
  )
}

export default plugin
