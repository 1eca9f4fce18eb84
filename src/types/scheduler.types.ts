/**
 * Type for job run status information
 */
export interface JobRunInfo {
  time: string
  status: 'completed' | 'failed' | 'pending'
  error?: string
  estimated?: boolean
}

/**
 * Type for configuration of interval jobs
 */
export interface IntervalConfig {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
}

/**
 * Type for configuration of cron jobs
 */
export interface CronConfig {
  expression: string
}

export type JobSchedule =
  | { type: 'interval'; config: IntervalConfig }
  | { type: 'cron'; config: CronConfig }

/**
 * Snapshot of a registered job, as exposed on the scheduler routes
 */
export interface JobStatus {
  name: string
  type: JobSchedule['type']
  config: IntervalConfig | CronConfig
  running: boolean
  last_run: JobRunInfo | null
  next_run: JobRunInfo | null
}
