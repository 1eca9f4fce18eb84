import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig, isRequestLoggingEnabled } from '@utils/logger.js'

/**
 * Builds the app, applies the configured log level, installs graceful
 * shutdown and starts listening. Startup failures terminate the process.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    disableRequestLogging: !isRequestLoggingEnabled(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: app.config.host,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

init().catch((err: unknown) => {
  console.error('Failed to start server', err)
  process.exit(1)
})
