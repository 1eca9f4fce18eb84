import { NotionError, toError } from '@utils/errors.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'

export interface RequestGateOptions {
  /** Requests allowed in flight at once */
  maxConcurrent: number
  /** Minimum spacing between request starts */
  minIntervalMs: number
  /** Retries on 429 and on network failure, counted separately */
  maxRetries: number
  /** Backoff base when the server sends no Retry-After */
  retryBaseDelayMs: number
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

/** ±10% jitter so parallel callers do not retry in lockstep */
const withJitter = (ms: number): number => ms + (Math.random() * 2 - 1) * ms * 0.1

/**
 * Outbound gate for the Notion API.
 *
 * Bounds concurrency with p-limit, spaces request starts by
 * `minIntervalMs`, and retries 429 responses after `Retry-After` (or an
 * exponential backoff) up to `maxRetries`.
 */
export class NotionRequestGate {
  private readonly limit: LimitFunction
  private nextSlotAt = 0

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly options: RequestGateOptions,
  ) {
    this.limit = pLimit(options.maxConcurrent)
  }

  get activeCount(): number {
    return this.limit.activeCount
  }

  get pendingCount(): number {
    return this.limit.pendingCount
  }

  /**
   * Waits for this caller's start slot. The reservation itself never
   * awaits, so it is the critical section guarding `nextSlotAt`: two
   * callers can never claim the same slot.
   */
  private async waitForSlot(): Promise<void> {
    const now = Date.now()
    const slot = Math.max(now, this.nextSlotAt)
    this.nextSlotAt = slot + this.options.minIntervalMs
    if (slot > now) {
      await sleep(slot - now)
    }
  }

  private retryDelay(response: Response, attempt: number): number {
    const retryAfter = response.headers.get('retry-after')
    const seconds = retryAfter === null ? Number.NaN : Number(retryAfter)
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000
    }
    return withJitter(2 ** attempt * this.options.retryBaseDelayMs)
  }

  /**
   * Runs `fetch` through the gate. Any non-429 response is returned as is.
   *
   * @throws NotionError when retries are exhausted
   */
  fetch(url: string, init: RequestInit): Promise<Response> {
    return this.limit(() => this.executeWithRetry(url, init))
  }

  private async executeWithRetry(
    url: string,
    init: RequestInit,
    retryCount429 = 0,
    retryCountNetwork = 0,
  ): Promise<Response> {
    const { maxRetries } = this.options
    await this.waitForSlot()

    let response: Response
    try {
      response = await fetch(url, init)
    } catch (error) {
      const err = toError(error)
      if (retryCountNetwork >= maxRetries) {
        throw new NotionError(`Notion request failed: ${err.message}`, undefined, {
          cause: err,
        })
      }
      const waitTime = withJitter(
        2 ** retryCountNetwork * this.options.retryBaseDelayMs,
      )
      this.log.warn(
        `Notion request failed, retrying after ${Math.round(waitTime)}ms (attempt ${retryCountNetwork + 1}/${maxRetries})`,
      )
      await sleep(waitTime)
      return this.executeWithRetry(
        url,
        init,
        retryCount429,
        retryCountNetwork + 1,
      )
    }

    if (response.status !== 429) {
      return response
    }

    if (retryCount429 >= maxRetries) {
      throw new NotionError(
        `Notion rate limit exceeded, max retries (${maxRetries}) reached`,
        429,
        { code: 'rate_limited' },
      )
    }

    const waitTime = this.retryDelay(response, retryCount429)
    this.log.warn(
      `Notion rate limit hit (429), retrying after ${Math.round(waitTime)}ms (attempt ${retryCount429 + 1}/${maxRetries})`,
    )
    await sleep(waitTime)
    return this.executeWithRetry(url, init, retryCount429 + 1, retryCountNetwork)
  }
}
