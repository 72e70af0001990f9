/**
 * Submits eligible listens to ListenBrainz in batches that fit its body limit.
 *
 * Listens are marked only after the service answered 200 for their batch.
 * Between calls the advertised rate limit is obeyed.
 */

import { ListenbrainzClient, encodeSubmitBody } from './listenbrainz-client'
import {
  LISTENBRAINZ_ASSUMED_LISTEN_BYTES,
  LISTENBRAINZ_BATCH_GROWTH,
  LISTENBRAINZ_MAX_BODY_BYTES,
} from './constants'
import { iterEligibleListens, markScrobbled } from '../db/listens'
import type { Store } from '../db'
import { adaptiveBatches } from '../lib/batching'
import { RateLimiter } from '../lib/rate-limit'
import { createLogger, type Logger } from '../cli/utils/logger'
import type { Listen } from '../types/listen'

export interface SubmitListensOptions {
  /** Reported as `listening_from` */
  clientName: string
  now?: Date
  rateLimiter?: RateLimiter
  maxBodyBytes?: number
  assumedListenBytes?: number
  /** Batch size increase after a batch that fit */
  growth?: number
  logger?: Logger
}

export interface SubmitSummary {
  batches: number
  submitted: number
}

export async function submitToListenbrainz(
  store: Store,
  client: ListenbrainzClient,
  options: SubmitListensOptions,
): Promise<SubmitSummary> {
  const now = options.now ?? new Date()
  const logger = options.logger ?? createLogger('listenbrainz')
  const rateLimiter = options.rateLimiter ?? new RateLimiter({ logger })

  const batches = adaptiveBatches<Listen>(iterEligibleListens(store), {
    maxBytes: options.maxBodyBytes ?? LISTENBRAINZ_MAX_BODY_BYTES,
    assumedItemBytes: options.assumedListenBytes ?? LISTENBRAINZ_ASSUMED_LISTEN_BYTES,
    growth: options.growth ?? LISTENBRAINZ_BATCH_GROWTH,
    encode: (listens) => encodeSubmitBody(listens, options.clientName),
    onTrial: ({ size, bytes, fits }) => {
      logger.debug(`Batch of ${size} listens is ${bytes} bytes${fits ? '' : ', too large'}`)
    },
  })

  const summary: SubmitSummary = { batches: 0, submitted: 0 }

  for (const batch of batches) {
    const headers = await client.submit(batch.body)

    markScrobbled(
      store,
      batch.items.map((listen) => listen.id),
      now,
    )
    logger.info(`Submitted ${batch.items.length} listens.`)

    summary.batches++
    summary.submitted += batch.items.length

    await rateLimiter.afterResponse(headers)
  }

  return summary
}
