import { ErrorSchema, errorResponse } from '@schemas/common/error.schema.js'
import {
  JobListResponseSchema,
  JobNameParamsSchema,
  JobRunResponseSchema,
} from '@schemas/scheduler/scheduler.schema.js'
import { createApiKeyGuard } from '@utils/api-key-guard.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  const guard = createApiKeyGuard(fastify)

  fastify.get(
    '/scheduler/jobs',
    {
      preHandler: guard,
      schema: {
        summary: 'List scheduled jobs',
        operationId: 'getJobs',
        response: {
          200: JobListResponseSchema,
          401: ErrorSchema,
        },
        tags: ['Scheduler'],
      },
    },
    async () => {
      return { status: 'success' as const, data: fastify.scheduler.getJobs() }
    },
  )

  fastify.post(
    '/scheduler/jobs/:name/run',
    {
      preHandler: guard,
      schema: {
        summary: 'Run a job now',
        operationId: 'runJob',
        description:
          'Runs a scheduled job immediately and returns its recorded run. A failed run is reported in the result, not as an error.',
        params: JobNameParamsSchema,
        response: {
          200: JobRunResponseSchema,
          401: ErrorSchema,
          404: ErrorSchema,
          409: ErrorSchema,
        },
        tags: ['Scheduler'],
      },
    },
    async (request, reply) => {
      const { name } = request.params
      const job = fastify.scheduler.getJob(name)
      if (!job) {
        return reply
          .code(404)
          .send(errorResponse('NOT_FOUND', `Job ${name} not found`))
      }
      if (job.running) {
        return reply
          .code(409)
          .send(errorResponse('JOB_RUNNING', `Job ${name} is already running`))
      }

      const run = await fastify.scheduler.runJobNow(name)
      if (!run) {
        return fastify.scheduler.getJob(name)
          ? reply
              .code(409)
              .send(errorResponse('JOB_RUNNING', `Job ${name} is already running`))
          : reply
              .code(404)
              .send(errorResponse('NOT_FOUND', `Job ${name} not found`))
      }
      return { status: 'success' as const, data: run }
    },
  )
}

export default plugin
