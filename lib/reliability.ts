/**
 * @module lib/reliability
 *
 * Fixed-delay retry for calls to remote services.
 *
 * @example
 * ```typescript
 * import { withRetry } from './reliability'
 *
 * // Retry the same page up to 10 times, 5 seconds apart
 * const page = await withRetry(
 *   () => client.getRecentTracks({ user, page: 3 }),
 *   { maxAttempts: 10, delayMs: 5000 }
 * )
 * ```
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default maximum retry attempts */
export const DEFAULT_MAX_RETRIES = 3

/** Default delay between attempts (1 second) */
export const DEFAULT_RETRY_DELAY_MS = 1000

// ============================================================================
// TYPES
// ============================================================================

export type SleepFn = (ms: number) => Promise<void>

/**
 * Options for retry wrapper
 */
export interface RetryOptions {
  /** Maximum number of attempts (including first try) */
  maxAttempts?: number
  /** Fixed delay in ms before each new attempt */
  delayMs?: number
  /** Custom retry condition - return true to retry */
  shouldRetry?: (error: Error, attempt: number) => boolean
  /** Callback on each retry */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
  /** Replaces the timer-based sleep (tests) */
  sleep?: SleepFn
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ============================================================================
// RETRY UTILITIES
// ============================================================================

const defaultShouldRetry = (): boolean => true

/**
 * Execute a function, retrying the same call after a fixed delay
 *
 * @returns The function result
 * @throws Last error if all retries exhausted, or the first error `shouldRetry` rejects
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_MAX_RETRIES,
    delayMs = DEFAULT_RETRY_DELAY_MS,
    shouldRetry = defaultShouldRetry,
    onRetry,
    sleep: sleepFn = sleep,
  } = options

  let lastError: Error | undefined
  let attempt = 0

  while (attempt < maxAttempts) {
    attempt++

    try {
      return await fn()
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err))

      if (attempt >= maxAttempts || !shouldRetry(lastError, attempt)) {
        throw lastError
      }

      onRetry?.(lastError, attempt, delayMs)

      if (delayMs > 0) {
        await sleepFn(delayMs)
      }
    }
  }

  throw lastError ?? new Error('Retry exhausted without error')
}
