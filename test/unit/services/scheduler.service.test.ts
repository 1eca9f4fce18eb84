import { SchedulerService } from '@services/scheduler.service.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

const HOURLY = { type: 'interval', config: { hours: 1 } } as const

describe('SchedulerService', () => {
  let logger: ReturnType<typeof createMockLogger>
  let scheduler: SchedulerService

  beforeEach(() => {
    logger = createMockLogger()
    scheduler = new SchedulerService(logger)
  })

  afterEach(() => {
    scheduler.stop()
  })

  describe('scheduleJob', () => {
    it('should register an interval job with an estimated next run', () => {
      const before = Date.now()
      scheduler.scheduleJob('stats', vi.fn().mockResolvedValue(undefined), HOURLY)

      const job = scheduler.getJob('stats')
      expect(job).toMatchObject({
        name: 'stats',
        type: 'interval',
        config: { hours: 1 },
        running: false,
        last_run: null,
        next_run: { status: 'pending', estimated: true },
      })
      const next = Date.parse(job?.next_run?.time ?? '')
      expect(next).toBeGreaterThanOrEqual(before + 3_600_000)
      expect(next).toBeLessThanOrEqual(Date.now() + 3_600_000)
    })

    it('should compute the next run of a cron job', () => {
      scheduler.scheduleJob('catalog', vi.fn().mockResolvedValue(undefined), {
        type: 'cron',
        config: { expression: '0 0 * * *' },
      })

      const next = new Date(scheduler.getJob('catalog')?.next_run?.time ?? '')
      expect(next.getTime()).toBeGreaterThan(Date.now())
      expect(next.getHours()).toBe(0)
      expect(next.getMinutes()).toBe(0)
    })

    it('should reject an interval of zero', () => {
      expect(() =>
        scheduler.scheduleJob('broken', vi.fn(), {
          type: 'interval',
          config: { minutes: 0 },
        }),
      ).toThrow('Job broken needs a positive interval')
      expect(scheduler.getJob('broken')).toBeNull()
    })

    it('should replace a job registered under the same name', async () => {
      const first = vi.fn().mockResolvedValue(undefined)
      const second = vi.fn().mockResolvedValue(undefined)
      scheduler.scheduleJob('stats', first, HOURLY)
      scheduler.scheduleJob('stats', second, {
        type: 'interval',
        config: { minutes: 30 },
      })

      await scheduler.runJobNow('stats')

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledWith('stats')
      expect(scheduler.getJobs()).toHaveLength(1)
      expect(scheduler.getJob('stats')?.config).toEqual({ minutes: 30 })
    })
  })

  describe('runJobNow', () => {
    it('should record a completed run', async () => {
      scheduler.scheduleJob('stats', vi.fn().mockResolvedValue(undefined), HOURLY)

      const run = await scheduler.runJobNow('stats')

      expect(run).toEqual({ time: expect.any(String), status: 'completed' })
      expect(scheduler.getJob('stats')?.last_run).toEqual(run)
      expect(scheduler.getJob('stats')?.running).toBe(false)
    })

    it('should record a failed run without throwing', async () => {
      scheduler.scheduleJob(
        'stats',
        vi.fn().mockRejectedValue(new Error('quota exceeded')),
        HOURLY,
      )

      const run = await scheduler.runJobNow('stats')

      expect(run).toEqual({
        time: expect.any(String),
        status: 'failed',
        error: 'quota exceeded',
      })
      expect(logger.error).toHaveBeenCalledWith(
        { error: expect.any(Error) },
        'Error in job stats',
      )
    })

    it('should report the job as running while its handler is pending', async () => {
      let release: () => void = () => {}
      scheduler.scheduleJob(
        'stats',
        () =>
          new Promise<void>((resolve) => {
            release = resolve
          }),
        HOURLY,
      )

      const run = scheduler.runJobNow('stats')
      expect(scheduler.getJob('stats')?.running).toBe(true)

      release()
      await run
      expect(scheduler.getJob('stats')?.running).toBe(false)
    })

    it('should skip a manual run while the job is still running', async () => {
      let release: () => void = () => {}
      const handler = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve
          }),
      )
      scheduler.scheduleJob('stats', handler, HOURLY)

      const first = scheduler.runJobNow('stats')
      const second = await scheduler.runJobNow('stats')

      expect(second).toBeNull()
      expect(handler).toHaveBeenCalledTimes(1)
      expect(logger.warn).toHaveBeenCalledWith(
        'Job stats is still running, skipping this run',
      )

      release()
      await expect(first).resolves.toEqual({
        time: expect.any(String),
        status: 'completed',
      })
    })

    it('should skip a scheduled tick while a manual run is pending', async () => {
      vi.useFakeTimers()
      try {
        let release: () => void = () => {}
        const handler = vi.fn(
          () =>
            new Promise<void>((resolve) => {
              release = resolve
            }),
        )
        scheduler.scheduleJob('stats', handler, {
          type: 'interval',
          config: { seconds: 1 },
        })

        const run = scheduler.runJobNow('stats')
        await vi.advanceTimersByTimeAsync(1000)

        expect(handler).toHaveBeenCalledTimes(1)

        release()
        await run
        scheduler.stop()
      } finally {
        vi.useRealTimers()
      }
    })

    it('should return null for an unknown job', async () => {
      await expect(scheduler.runJobNow('missing')).resolves.toBeNull()
    })
  })

  describe('unscheduleJob', () => {
    it('should remove a registered job', () => {
      scheduler.scheduleJob('stats', vi.fn(), HOURLY)

      expect(scheduler.unscheduleJob('stats')).toBe(true)
      expect(scheduler.getJobs()).toEqual([])
    })

    it('should return false for an unknown job', () => {
      expect(scheduler.unscheduleJob('missing')).toBe(false)
    })
  })

  it('should drop every job on stop', () => {
    scheduler.scheduleJob('a', vi.fn(), HOURLY)
    scheduler.scheduleJob('b', vi.fn(), HOURLY)

    scheduler.stop()

    expect(scheduler.getJobs()).toEqual([])
  })
})
