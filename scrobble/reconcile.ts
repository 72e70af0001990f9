/**
 * Matches the per-item results of a scrobble response to the submitted batch.
 *
 * Item `i` of the response belongs to listen `i` of the batch. The response
 * is trusted only when it has one item per listen and the batch-level
 * accepted counter equals the number of individually accepted items; any
 * other response throws before a single listen is marked.
 */

import { InvariantError } from '../cli/utils/errors'
import type { Listen } from '../types/listen'
import type { ScrobbleBatchResult, ScrobbleItem } from '../types/lastfm'

/** `ignoredMessage.code` of an accepted scrobble */
export const ACCEPTED_CODE = '0'

export interface RejectedScrobble {
  listen: Listen
  item: ScrobbleItem
}

export interface Reconciliation {
  /** Ids to mark, in batch order */
  acceptedIds: number[]
  rejected: RejectedScrobble[]
}

export function isAccepted(item: ScrobbleItem): boolean {
  return item.ignoredMessage.code === ACCEPTED_CODE
}

/**
 * @throws InvariantError when the response does not account for the batch exactly
 */
export function reconcileScrobbles(
  batch: readonly Listen[],
  result: ScrobbleBatchResult,
  rawBody: string,
): Reconciliation {
  if (result.items.length !== batch.length) {
    throw InvariantError.malformedResponse(
      `expected ${batch.length} scrobble results, received ${result.items.length}`,
      rawBody,
    )
  }

  const acceptedIds: number[] = []
  const rejected: RejectedScrobble[] = []

  batch.forEach((listen, i) => {
    const item = result.items[i]
    if (item === undefined) return
    if (isAccepted(item)) {
      acceptedIds.push(listen.id)
    } else {
      rejected.push({ listen, item })
    }
  })

  if (acceptedIds.length !== result.accepted) {
    throw InvariantError.acceptedCountMismatch(result.accepted, acceptedIds.length, rawBody)
  }

  return { acceptedIds, rejected }
}
