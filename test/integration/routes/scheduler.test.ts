import { describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'
import { expectErrorResponse } from '../../helpers/assertions.js'

describe('Scheduler Routes', () => {
  describe('GET /scheduler/jobs', () => {
    it('should list no jobs while the scheduler is disabled', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({ method: 'GET', url: '/scheduler/jobs' })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({ status: 'success', data: [] })
    })

    it('should list registered jobs with their schedules', async (ctx) => {
      const app = await build(ctx)
      app.scheduler.scheduleJob('catalog-sync', vi.fn().mockResolvedValue(undefined), {
        type: 'cron',
        config: { expression: '0 0 * * *' },
      })
      app.scheduler.scheduleJob('channel-stats-sync', vi.fn().mockResolvedValue(undefined), {
        type: 'interval',
        config: { minutes: 60 },
      })

      const res = await app.inject({ method: 'GET', url: '/scheduler/jobs' })

      expect(res.statusCode).toBe(200)
      expect(res.json().data).toEqual([
        {
          name: 'catalog-sync',
          type: 'cron',
          config: { expression: '0 0 * * *' },
          running: false,
          last_run: null,
          next_run: { time: expect.any(String), status: 'pending', estimated: true },
        },
        {
          name: 'channel-stats-sync',
          type: 'interval',
          config: { minutes: 60 },
          running: false,
          last_run: null,
          next_run: { time: expect.any(String), status: 'pending', estimated: true },
        },
      ])
    })

    it('should require the API key when one is configured', async (ctx) => {
      const app = await build(ctx)
      app.config.webhookApiKey = 'test-secret'

      const res = await app.inject({ method: 'GET', url: '/scheduler/jobs' })

      expectErrorResponse(res.statusCode, res.payload, {
        statusCode: 401,
        code: 'UNAUTHORIZED',
      })
    })
  })

  describe('POST /scheduler/jobs/:name/run', () => {
    it('should run the job and return its recorded run', async (ctx) => {
      const app = await build(ctx)
      const handler = vi.fn().mockResolvedValue(undefined)
      app.scheduler.scheduleJob('catalog-sync', handler, {
        type: 'interval',
        config: { hours: 24 },
      })

      const res = await app.inject({
        method: 'POST',
        url: '/scheduler/jobs/catalog-sync/run',
      })

      expect(res.statusCode).toBe(200)
      expect(res.json()).toEqual({
        status: 'success',
        data: { time: expect.any(String), status: 'completed' },
      })
      expect(handler).toHaveBeenCalledWith('catalog-sync')
    })

    it('should report a failed run in the result', async (ctx) => {
      const app = await build(ctx)
      app.scheduler.scheduleJob(
        'channel-stats-sync',
        vi.fn().mockRejectedValue(new Error('Channel not found: @testchannel')),
        { type: 'interval', config: { minutes: 60 } },
      )

      const res = await app.inject({
        method: 'POST',
        url: '/scheduler/jobs/channel-stats-sync/run',
      })

      expect(res.statusCode).toBe(200)
      expect(res.json().data).toEqual({
        time: expect.any(String),
        status: 'failed',
        error: 'Channel not found: @testchannel',
      })
    })

    it('should return 409 while the job is running', async (ctx) => {
      const app = await build(ctx)
      let release: () => void = () => {}
      app.scheduler.scheduleJob(
        'catalog-sync',
        () =>
          new Promise<void>((resolve) => {
            release = resolve
          }),
        { type: 'interval', config: { hours: 24 } },
      )
      const firstRun = app.scheduler.runJobNow('catalog-sync')

      const res = await app.inject({
        method: 'POST',
        url: '/scheduler/jobs/catalog-sync/run',
      })

      expectErrorResponse(res.statusCode, res.payload, {
        statusCode: 409,
        code: 'JOB_RUNNING',
        message: 'Job catalog-sync is already running',
      })
      release()
      await firstRun
    })

    it('should return 404 for an unknown job', async (ctx) => {
      const app = await build(ctx)

      const res = await app.inject({
        method: 'POST',
        url: '/scheduler/jobs/missing/run',
      })

      expectErrorResponse(res.statusCode, res.payload, {
        statusCode: 404,
        code: 'NOT_FOUND',
        message: 'Job missing not found',
      })
    })
  })
})
