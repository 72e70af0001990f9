/**
 * Reliability Module Tests
 *
 * Tests for the retry helpers in lib/reliability.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  withRetry,
  sleep,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
} from './reliability'

describe('Retry Utilities', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('sleep', () => {
    it('should resolve after the given duration', async () => {
      const done = vi.fn()
      const pending = sleep(1000).then(done)

      await vi.advanceTimersByTimeAsync(999)
      expect(done).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(1)
      await pending
      expect(done).toHaveBeenCalledTimes(1)
    })
  })

  describe('withRetry', () => {
    it('should succeed on first attempt if no error', async () => {
      const fn = vi.fn().mockResolvedValue('success')

      const result = await withRetry(fn, { maxAttempts: 3, delayMs: 0 })

      expect(result).toBe('success')
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it('should retry on failure and succeed', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('fail 1'))
        .mockRejectedValueOnce(new Error('fail 2'))
        .mockResolvedValue('success')

      const result = await withRetry(fn, { maxAttempts: 5, delayMs: 0 })

      expect(result).toBe('success')
      expect(fn).toHaveBeenCalledTimes(3)
    })

    it('should throw last error after exhausting retries', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('always fails'))

      await expect(withRetry(fn, { maxAttempts: 3, delayMs: 0 })).rejects.toThrow('always fails')

      expect(fn).toHaveBeenCalledTimes(3)
    })

    it('should respect shouldRetry condition', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('not retryable'))

      await expect(
        withRetry(fn, {
          maxAttempts: 5,
          delayMs: 0,
          shouldRetry: () => false,
        })
      ).rejects.toThrow('not retryable')

      // Only called once because shouldRetry returned false
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it('should wrap non-Error rejections', async () => {
      const fn = vi.fn().mockRejectedValue('plain string')

      await expect(withRetry(fn, { maxAttempts: 1 })).rejects.toThrow('plain string')
    })

    it('should call onRetry callback on each retry', async () => {
      const onRetry = vi.fn()
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('fail 1'))
        .mockRejectedValueOnce(new Error('fail 2'))
        .mockResolvedValue('success')

      await withRetry(fn, { maxAttempts: 5, delayMs: 0, onRetry })

      expect(onRetry).toHaveBeenCalledTimes(2)
      expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 0)
      expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 2, 0)
    })

    it('should wait the delay between retries', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('fail'))
        .mockResolvedValue('success')

      const retryPromise = withRetry(fn, {
        maxAttempts: 3,
        delayMs: 1000,
      })

      // First call should happen immediately
      expect(fn).toHaveBeenCalledTimes(1)

      // Advance past the delay
      await vi.advanceTimersByTimeAsync(1100)

      const result = await retryPromise

      expect(result).toBe('success')
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it('should use the injected sleep instead of timers', async () => {
      const sleepFn = vi.fn(async (_ms: number) => {})
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('fail 1'))
        .mockRejectedValueOnce(new Error('fail 2'))
        .mockResolvedValue('page')

      const result = await withRetry(fn, { maxAttempts: 10, delayMs: 5000, sleep: sleepFn })

      expect(result).toBe('page')
      expect(sleepFn).toHaveBeenCalledTimes(2)
      expect(sleepFn).toHaveBeenNthCalledWith(1, 5000)
      expect(sleepFn).toHaveBeenNthCalledWith(2, 5000)
    })

    it('should not sleep after the last attempt', async () => {
      const sleepFn = vi.fn(async (_ms: number) => {})
      const fn = vi.fn().mockRejectedValue(new Error('down'))

      await expect(withRetry(fn, { maxAttempts: 3, delayMs: 10, sleep: sleepFn })).rejects.toThrow('down')

      expect(sleepFn).toHaveBeenCalledTimes(2)
    })
  })
})

describe('Exported Constants', () => {
  it('should export sensible defaults', () => {
    expect(DEFAULT_MAX_RETRIES).toBe(3)
    expect(DEFAULT_RETRY_DELAY_MS).toBe(1000)
  })
})
