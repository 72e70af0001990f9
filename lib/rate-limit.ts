/**
 * Advertised Rate Limit Follower
 *
 * Obeys the quota a remote service advertises in its response headers:
 * when the remaining call count drops to one or zero, wait out the reset
 * delay before the next call instead of running into a hard rejection.
 *
 * Usage:
 * ```typescript
 * const limiter = new RateLimiter()
 * const response = await fetch(url, init)
 * await limiter.afterResponse(response.headers)
 * ```
 */

import { sleep as defaultSleep, type SleepFn } from './reliability'
import { createLogger, type Logger } from '../cli/utils/logger'

export const RATE_LIMIT_REMAINING_HEADER = 'X-RateLimit-Remaining'
export const RATE_LIMIT_RESET_IN_HEADER = 'X-RateLimit-Reset-In'

export interface RateLimiterOptions {
  /** Remaining quota assumed when the header is absent (default: 10) */
  defaultRemaining?: number
  /** Reset delay in seconds assumed when the header is absent (default: 1) */
  defaultResetSeconds?: number
  /** Sleep when remaining is at or below this value (default: 1) */
  threshold?: number
  sleep?: SleepFn
  logger?: Logger
}

/**
 * What the limiter read from a response and whether it waited
 */
export interface RateLimitDecision {
  remaining: number
  resetSeconds: number
  sleptMs: number
}

/** Minimal header access, satisfied by the fetch `Headers` class */
export interface HeaderSource {
  get(name: string): string | null
}

export class RateLimiter {
  private defaultRemaining: number
  private defaultResetSeconds: number
  private threshold: number
  private sleep: SleepFn
  private logger: Logger

  constructor(options: RateLimiterOptions = {}) {
    this.defaultRemaining = options.defaultRemaining ?? 10
    this.defaultResetSeconds = options.defaultResetSeconds ?? 1
    this.threshold = options.threshold ?? 1
    this.sleep = options.sleep ?? defaultSleep
    this.logger = options.logger ?? createLogger('rate-limit')
  }

  /**
   * Inspect the quota headers of a successful response and sleep if the
   * next call would exhaust it.
   */
  async afterResponse(headers: HeaderSource): Promise<RateLimitDecision> {
    const remaining = parseHeader(headers.get(RATE_LIMIT_REMAINING_HEADER), this.defaultRemaining)
    const resetSeconds = parseHeader(headers.get(RATE_LIMIT_RESET_IN_HEADER), this.defaultResetSeconds)

    if (remaining > this.threshold) {
      return { remaining, resetSeconds, sleptMs: 0 }
    }

    const sleptMs = Math.max(0, Math.round(resetSeconds * 1000))
    this.logger.debug(`Rate limit nearly exhausted (${remaining} left), waiting ${resetSeconds}s`)
    await this.sleep(sleptMs)
    return { remaining, resetSeconds, sleptMs }
  }
}

function parseHeader(value: string | null, fallback: number): number {
  if (value === null || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}
