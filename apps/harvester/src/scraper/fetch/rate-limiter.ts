/**
 * Per-source rate limiter
 *
 * A counting admission gate bounds in-flight requests for one source and a
 * fixed delay is inserted before every request. One instance per source
 * run; nothing is shared between sources.
 */

import { FetchAbortedError } from '../errors.js'
import type { RateLimitConfig } from '../types.js'
import { DEFAULT_RATE_LIMIT } from '../types.js'

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Timer-based sleep that ends early (resolving) when the signal aborts;
 * callers check the signal afterwards.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })

interface Waiter {
  grant: () => void
}

export interface SourceRateLimiterOptions {
  sleep?: Sleep
}

export class SourceRateLimiter {
  private config: RateLimitConfig
  private readonly sleepFn: Sleep
  private active = 0
  private readonly waiters: Waiter[] = []

  constructor(config: Partial<RateLimitConfig> = {}, options: SourceRateLimiterOptions = {}) {
    this.config = {
      maxConcurrent: Math.max(1, config.maxConcurrent ?? DEFAULT_RATE_LIMIT.maxConcurrent),
      minDelayMs: Math.max(0, config.minDelayMs ?? DEFAULT_RATE_LIMIT.minDelayMs),
    }
    this.sleepFn = options.sleep ?? sleep
  }

  getConfig(): RateLimitConfig {
    return { ...this.config }
  }

  /** Requests currently holding a slot */
  get inFlight(): number {
    return this.active
  }

  /** Callers suspended at the gate */
  get waiting(): number {
    return this.waiters.length
  }

  /**
   * Wait for a slot. Resolves with the release function; rejects with
   * FetchAbortedError if the signal aborts first.
   */
  acquire(url: string, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new FetchAbortedError(url))
    }

    if (this.active < this.config.maxConcurrent) {
      this.active++
      return Promise.resolve(this.releaser())
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter)
        if (index >= 0) {
          this.waiters.splice(index, 1)
        }
        reject(new FetchAbortedError(url))
      }
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve(this.releaser())
        },
      }
      this.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  /** Inter-request delay; called before every transport call */
  async pace(signal?: AbortSignal): Promise<void> {
    await this.sleepFn(this.config.minDelayMs, signal)
  }

  private releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        // Slot passes straight to the next waiter; active count unchanged
        next.grant()
      } else {
        this.active--
      }
    }
  }
}
