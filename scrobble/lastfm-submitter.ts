/**
 * Submits eligible listens to Last.fm in batches of 50.
 *
 * Last.fm ignores scrobbles older than 14 days, so only listens that
 * started after `now - 14 days` are read. Each batch is reconciled against
 * the response before its accepted listens are marked; a response that does
 * not add up aborts the run with the whole batch left unmarked.
 */

import { LastfmClient } from './lastfm-client'
import { reconcileScrobbles } from './reconcile'
import { DAY_MS, LASTFM_MAX_BACKDATE_DAYS, LASTFM_MAX_BATCH_SIZE } from './constants'
import { iterEligibleListens, markScrobbled } from '../db/listens'
import type { Store } from '../db'
import { chunks } from '../lib/batching'
import { createLogger, type Logger } from '../cli/utils/logger'

export interface ScrobbleOptions {
  /** Timestamp written as the marker, and the reference for the backdating bound */
  now?: Date
  batchSize?: number
  logger?: Logger
}

export interface ScrobbleSummary {
  batches: number
  submitted: number
  accepted: number
  rejected: number
}

export async function scrobbleToLastfm(
  store: Store,
  client: LastfmClient,
  options: ScrobbleOptions = {},
): Promise<ScrobbleSummary> {
  const now = options.now ?? new Date()
  const logger = options.logger ?? createLogger('lastfm')
  const since = new Date(now.getTime() - LASTFM_MAX_BACKDATE_DAYS * DAY_MS)

  const summary: ScrobbleSummary = { batches: 0, submitted: 0, accepted: 0, rejected: 0 }

  for (const batch of chunks(iterEligibleListens(store, { since }), options.batchSize ?? LASTFM_MAX_BATCH_SIZE)) {
    const { result, body } = await client.scrobble(batch)
    const { acceptedIds, rejected } = reconcileScrobbles(batch, result, body)

    for (const { listen, item } of rejected) {
      logger.warn(`Last.fm rejected listen ${listen.id} (${listen.trackArtist} - ${listen.trackTitle}), response:`, item)
    }

    markScrobbled(store, acceptedIds, now)
    logger.info(`Scrobbled ${acceptedIds.length} listens.`)

    summary.batches++
    summary.submitted += batch.length
    summary.accepted += acceptedIds.length
    summary.rejected += rejected.length
  }

  return summary
}
