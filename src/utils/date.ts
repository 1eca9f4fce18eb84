import { addDays, format, subDays } from 'date-fns'

export interface DateWindow {
  /** Inclusive lower bound, `YYYY-MM-DD` */
  start: string
  /** Inclusive upper bound, `YYYY-MM-DD` */
  end: string
}

export const toDateString = (date: Date): string => format(date, 'yyyy-MM-dd')

/**
 * Closed calendar window `[now - pastDays, now + futureDays]`.
 */
export function calendarWindow(
  pastDays: number,
  futureDays: number,
  now: Date = new Date(),
): DateWindow {
  return {
    start: toDateString(subDays(now, pastDays)),
    end: toDateString(addDays(now, futureDays)),
  }
}
