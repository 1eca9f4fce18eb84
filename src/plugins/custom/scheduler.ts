import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(fastify.log)
    fastify.decorate('scheduler', scheduler)

    fastify.addHook('onClose', () => {
      scheduler.stop()
    })
  },
  {
    name: 'scheduler',
  },
)
