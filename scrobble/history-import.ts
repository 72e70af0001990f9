/**
 * Last.fm History Import
 *
 * Copies a user's listening history from Last.fm into the `lastfm_listens`
 * staging table, newest page first.
 *
 * - `full` reads the whole history.
 * - `incremental` reads from `now - 30 days`, or from the newest staged
 *   listen when that is more recent.
 *
 * Paging stops as soon as the number of staged listens in the range equals
 * the total the service reports, so an incremental run usually ends after
 * the first page. A page that fails is retried after a fixed delay; ten
 * failures in a row abort the import.
 */

import {
  DAY_MS,
  HISTORY_MAX_CONSECUTIVE_FAILURES,
  HISTORY_RETRY_DELAY_MS,
  INCREMENTAL_WINDOW_DAYS,
} from './constants'
import type { RecentTracksQuery } from './lastfm-client'
import { countStaged, newestStagedSeconds, upsertStagingPage } from '../db/staging'
import type { NewStagingRow } from '../db/schema'
import type { Store } from '../db'
import { withRetry, type SleepFn } from '../lib/reliability'
import { repairMojibake } from '../lib/text-repair'
import { ErrorCode, ImportAbortedError, InvariantError, NetworkError, summarizeError } from '../cli/utils/errors'
import { createLogger, type Logger } from '../cli/utils/logger'
import { toUnixSeconds } from '../types/listen'
import type { RecentTrack, RecentTracksPage } from '../types/lastfm'

export type ImportMode = 'full' | 'incremental'

/** The part of the Last.fm client the import needs */
export interface HistorySource {
  getRecentTracks(query: RecentTracksQuery): Promise<RecentTracksPage>
}

export interface ImportHistoryOptions {
  user: string
  mode?: ImportMode
  now?: Date
  windowDays?: number
  retryDelayMs?: number
  maxConsecutiveFailures?: number
  sleep?: SleepFn
  logger?: Logger
}

export interface ImportSummary {
  /** Lower bound of the imported range, seconds since the epoch (null: everything) */
  since: number | null
  pages: number
  /** Rows that were new to the staging table */
  imported: number
  /** Listens in the range according to the service */
  total: number
  /** Listens in the range in the staging table */
  local: number
  /** Whether the local count caught up with the service's */
  converged: boolean
}

/**
 * Lower bound of the range an import reads.
 */
export function importLowerBound(store: Store, mode: ImportMode, now: Date, windowDays = INCREMENTAL_WINDOW_DAYS): number | null {
  if (mode === 'full') {
    return null
  }
  const windowStart = toUnixSeconds(new Date(now.getTime() - windowDays * DAY_MS))
  const newest = newestStagedSeconds(store)
  return newest !== null && newest > windowStart ? newest : windowStart
}

/**
 * Staging row for a history entry, or null for the track playing right now
 */
export function toStagingRow(track: RecentTrack): NewStagingRow | null {
  if (track.date === undefined) {
    return null
  }
  return {
    secondsSinceEpoch: track.date.uts,
    title: repairMojibake(track.name),
    trackArtist: repairMojibake(track.artist['#text']),
    album: repairMojibake(track.album['#text']),
    trackMbid: track.mbid || null,
    artistMbid: track.artist.mbid || null,
    albumMbid: track.album.mbid || null,
  }
}

/**
 * Failures worth another attempt: transport and HTTP errors, and bodies
 * that could not be decoded.
 */
export function isRetryableImportError(error: Error): boolean {
  if (error instanceof NetworkError) {
    return true
  }
  return error instanceof InvariantError && error.code === ErrorCode.MALFORMED_RESPONSE
}

export async function importHistory(
  store: Store,
  source: HistorySource,
  options: ImportHistoryOptions,
): Promise<ImportSummary> {
  const mode = options.mode ?? 'incremental'
  const now = options.now ?? new Date()
  const logger = options.logger ?? createLogger('history')
  const maxAttempts = options.maxConsecutiveFailures ?? HISTORY_MAX_CONSECUTIVE_FAILURES
  const since = importLowerBound(store, mode, now, options.windowDays)

  logger.info(
    since === null
      ? `Importing the full history of ${options.user}.`
      : `Importing history of ${options.user} since ${new Date(since * 1000).toISOString()}.`,
  )

  const fetchPage = async (page: number): Promise<RecentTracksPage> => {
    try {
      return await withRetry(() => source.getRecentTracks({ user: options.user, page, from: since }), {
        maxAttempts,
        delayMs: options.retryDelayMs ?? HISTORY_RETRY_DELAY_MS,
        shouldRetry: isRetryableImportError,
        sleep: options.sleep,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(`Page ${page} failed (attempt ${attempt}): ${summarizeError(error)}. Retrying in ${delayMs / 1000}s.`)
        },
      })
    } catch (err) {
      if (err instanceof Error && isRetryableImportError(err)) {
        throw new ImportAbortedError(page, maxAttempts, err)
      }
      throw err
    }
  }

  const summary: ImportSummary = { since, pages: 0, imported: 0, total: 0, local: 0, converged: false }

  for (let page = 1; ; page++) {
    const result = await fetchPage(page)
    const rows = result.tracks.map(toStagingRow).filter((row): row is NewStagingRow => row !== null)

    summary.imported += upsertStagingPage(store, rows)
    summary.pages++
    summary.total = result.total
    summary.local = countStaged(store, since)

    logger.info(`Imported page ${page}/${result.totalPages}, ${summary.local} of ${result.total} listens staged.`)

    if (summary.local === result.total) {
      summary.converged = true
      break
    }
    if (result.totalPages === 0 || page >= result.totalPages) {
      break
    }
  }

  return summary
}
