/**
 * Scheduler Service
 *
 * In-memory job registry over toad-scheduler for interval and cron jobs.
 *
 * Responsible for:
 * - Registering, replacing and removing scheduled jobs
 * - Catching job failures so they only reach the log and the job's last run
 * - Tracking last and next run of every job
 * - Manual job execution
 *
 * @example
 * scheduler.scheduleJob('catalog-sync', async () => sync.syncCatalog(), {
 *   type: 'cron',
 *   config: { expression: '0 0 * * *' },
 * })
 */
import type {
  IntervalConfig,
  JobRunInfo,
  JobSchedule,
  JobStatus,
} from '@root/types/scheduler.types.js'
import { errorMessage } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import { Cron } from 'croner'
import type { FastifyBaseLogger } from 'fastify'
import {
  AsyncTask,
  CronJob,
  SimpleIntervalJob,
  ToadScheduler,
} from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

interface RegisteredJob {
  handler: JobHandler
  schedule: JobSchedule
  running: boolean
  lastRun: JobRunInfo | null
  nextRun: JobRunInfo | null
}

const intervalMs = (config: IntervalConfig): number =>
  ((((config.days ?? 0) * 24 + (config.hours ?? 0)) * 60 +
    (config.minutes ?? 0)) *
    60 +
    (config.seconds ?? 0)) *
  1000

export class SchedulerService {
  private readonly scheduler = new ToadScheduler()
  private readonly jobs = new Map<string, RegisteredJob>()

  constructor(private readonly baseLog: FastifyBaseLogger) {}

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SCHEDULER')
  }

  /**
   * Estimated next run for a schedule, or null for a cron expression with
   * no future occurrence.
   */
  private calculateNextRun(schedule: JobSchedule, from: Date): JobRunInfo | null {
    let next: Date | null
    if (schedule.type === 'interval') {
      next = new Date(from.getTime() + intervalMs(schedule.config))
    } else {
      next = new Cron(schedule.config.expression).nextRun(from)
    }
    return next
      ? { time: next.toISOString(), status: 'pending', estimated: true }
      : null
  }

  /**
   * Runs a job's handler and records the outcome. Never throws.
   *
   * @returns the recorded run, or null when the job was still running and
   * this run was skipped
   */
  private async execute(
    name: string,
    job: RegisteredJob,
  ): Promise<JobRunInfo | null> {
    if (job.running) {
      this.log.warn(`Job ${name} is still running, skipping this run`)
      return null
    }
    job.running = true
    let lastRun: JobRunInfo
    try {
      this.log.debug(`Running scheduled job: ${name}`)
      await job.handler(name)
      lastRun = { time: new Date().toISOString(), status: 'completed' }
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      lastRun = {
        time: new Date().toISOString(),
        status: 'failed',
        error: errorMessage(error),
      }
    } finally {
      job.running = false
    }
    job.lastRun = lastRun
    job.nextRun = this.calculateNextRun(job.schedule, new Date())
    return lastRun
  }

  private createJob(
    name: string,
    job: RegisteredJob,
  ): SimpleIntervalJob | CronJob {
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        await this.execute(name, job)
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    const { schedule } = job
    if (schedule.type === 'interval') {
      return new SimpleIntervalJob({ ...schedule.config }, task, {
        id: name,
        preventOverrun: true,
      })
    }
    return new CronJob({ cronExpression: schedule.config.expression }, task, {
      id: name,
      preventOverrun: true,
    })
  }

  /**
   * Registers a job, replacing any job of the same name.
   *
   * @throws Error for an interval of zero or an invalid cron expression
   */
  scheduleJob(name: string, handler: JobHandler, schedule: JobSchedule): void {
    if (schedule.type === 'interval' && intervalMs(schedule.config) <= 0) {
      throw new Error(`Job ${name} needs a positive interval`)
    }

    const job: RegisteredJob = {
      handler,
      schedule,
      running: false,
      lastRun: null,
      nextRun: this.calculateNextRun(schedule, new Date()),
    }
    const scheduled = this.createJob(name, job)

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }
    if (scheduled instanceof SimpleIntervalJob) {
      this.scheduler.addSimpleIntervalJob(scheduled)
    } else {
      this.scheduler.addCronJob(scheduled)
    }
    this.jobs.set(name, job)

    this.log.info(
      { schedule },
      `Job ${name} scheduled, next run at ${job.nextRun?.time ?? 'never'}`,
    )
  }

  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) {
      return false
    }
    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled successfully`)
    return true
  }

  /**
   * Runs a job immediately, outside of its schedule.
   *
   * @returns the recorded run, or null when no job has this name or the
   * job is already running
   */
  async runJobNow(name: string): Promise<JobRunInfo | null> {
    const job = this.jobs.get(name)
    if (!job) {
      return null
    }
    this.log.info(`Manually running job: ${name}`)
    return this.execute(name, job)
  }

  getJob(name: string): JobStatus | null {
    const job = this.jobs.get(name)
    if (!job) {
      return null
    }
    return {
      name,
      type: job.schedule.type,
      config: job.schedule.config,
      running: job.running,
      last_run: job.lastRun,
      next_run: job.nextRun,
    }
  }

  getJobs(): JobStatus[] {
    return [...this.jobs.keys()].flatMap((name) => this.getJob(name) ?? [])
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.scheduler.stop()
    this.jobs.clear()
    this.log.info('Scheduler stopped')
  }
}
