/**
 * @module lib/batching
 *
 * Splits a lazy, single-pass sequence into submission batches.
 *
 * - `chunks` groups a fixed number of items per batch (services that cap the
 *   entry count of a request).
 * - `adaptiveBatches` groups as many items as fit a byte budget once
 *   serialized (services that cap the request body size). The serialized
 *   size of an item is not known up front, so the batch size is tuned while
 *   batches are built: start from an estimate, shrink by one when the body
 *   is too large, grow after every batch that fit.
 *
 * Both consume the upstream iterator exactly once. Once it reports `done`
 * it is never pulled again.
 */

import { InvariantError, ValidationError } from '../cli/utils/errors'

// ============================================================================
// Fixed count
// ============================================================================

/**
 * Yield consecutive groups of `size` items; the last group may be smaller.
 * Never yields an empty group.
 */
export function* chunks<T>(items: Iterable<T>, size: number): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw ValidationError.invalidArgument('size', 'a positive integer', String(size))
  }

  let chunk: T[] = []
  for (const item of items) {
    chunk.push(item)
    if (chunk.length === size) {
      yield chunk
      chunk = []
    }
  }

  if (chunk.length > 0) {
    yield chunk
  }
}

// ============================================================================
// Adaptive byte size
// ============================================================================

export interface AdaptiveBatchOptions<T> {
  /** Largest allowed serialized body, in bytes */
  maxBytes: number
  /** Estimated serialized size of one item, seeds the first batch size */
  assumedItemBytes: number
  /** Batch size increase after a batch that fit (default: 5) */
  growth?: number
  /** Serialize a tentative batch into the request body */
  encode: (items: T[]) => string
  /** Called for every tentative batch, fitting or not */
  onTrial?: (trial: BatchTrial) => void
}

export interface BatchTrial {
  size: number
  bytes: number
  fits: boolean
}

export interface EncodedBatch<T> {
  items: T[]
  /** The serialized body, within `maxBytes` */
  body: string
  bytes: number
}

/**
 * Initial batch size for a byte budget and an assumed per-item size.
 */
export function initialBatchSize(maxBytes: number, assumedItemBytes: number): number {
  return Math.max(1, Math.floor(maxBytes / assumedItemBytes))
}

/**
 * Yield batches whose serialized body fits `maxBytes`.
 *
 * @throws InvariantError when a single item does not fit on its own
 */
export function* adaptiveBatches<T>(
  items: Iterable<T>,
  options: AdaptiveBatchOptions<T>,
): Generator<EncodedBatch<T>, void, undefined> {
  const { maxBytes, assumedItemBytes, growth = 5, encode, onTrial } = options

  if (!(maxBytes > 0) || !(assumedItemBytes > 0)) {
    throw ValidationError.invalidArgument('maxBytes/assumedItemBytes', 'positive numbers')
  }
  if (!Number.isInteger(growth) || growth < 0) {
    throw ValidationError.invalidArgument('growth', 'a non-negative integer', String(growth))
  }

  const upstream = items[Symbol.iterator]()
  let exhausted = false
  let buffer: T[] = []
  let n = initialBatchSize(maxBytes, assumedItemBytes)

  while (true) {
    while (!exhausted && buffer.length < 2 * n) {
      const next = upstream.next()
      if (next.done) {
        exhausted = true
      } else {
        buffer.push(next.value)
      }
    }

    if (buffer.length === 0) {
      return
    }

    // A tentative batch never holds more than what is buffered.
    let size = Math.min(n, buffer.length)

    while (true) {
      const batch = buffer.slice(0, size)
      const body = encode(batch)
      const bytes = Buffer.byteLength(body, 'utf8')
      const fits = bytes <= maxBytes
      onTrial?.({ size, bytes, fits })

      if (fits) {
        buffer = buffer.slice(size)
        yield { items: batch, body, bytes }
        n = size + growth
        break
      }

      if (size === 1) {
        throw InvariantError.itemTooLarge(maxBytes, bytes)
      }
      size -= 1
    }
  }
}
