import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const srcDir = path.dirname(fileURLToPath(import.meta.url))

/**
 * Loads external plugins (config, security, docs), then the service plugins,
 * then the routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
