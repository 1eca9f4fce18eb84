import fp from 'fastify-plugin'
import apiReference from '@scalar/fastify-api-reference'
import fastifySwagger from '@fastify/swagger'
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  const urlObject = new URL(fastify.config.baseUrl)

  fastify.log.debug(
    `Configuring Swagger with base URL: ${fastify.config.baseUrl}`,
  )

  return {
    openapi: {
      info: {
        title: 'telly-sync API',
        description:
          'Sonarr catalog cache, webhook relay and Notion dashboard sync',
        version: 'V1',
      },
      servers: [
        {
          url: fastify.config.baseUrl,
          description: 'Primary Server',
        },
        {
          url: `${urlObject.protocol}//${urlObject.hostname}:${fastify.config.port}`,
          description: 'Direct Server Access (with port)',
        },
      ],
      tags: [
        {
          name: 'Sonarr',
          description: 'Cached Sonarr catalog',
        },
        {
          name: 'Calendar',
          description: 'Upcoming episodes',
        },
        {
          name: 'Webhook',
          description: 'Sonarr webhook ingress',
        },
        {
          name: 'Scheduler',
          description: 'Dashboard sync jobs',
        },
        {
          name: 'System',
          description: 'Health and status',
        },
      ],
      components: {
        securitySchemes: {
          apiKeyAuth: {
            type: 'apiKey' as const,
            in: 'header' as const,
            name: 'X-API-Key',
            description:
              'Shared secret, checked only when webhookApiKey is configured',
          },
        },
      },
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    await fastify.register(apiReference, {
      routePrefix: '/api/docs',
    })
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
