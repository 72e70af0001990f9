/**
 * @module db/listens
 *
 * Reads listens that still need to be submitted, and records submissions.
 *
 * A listen is eligible when:
 * - `scrobbled_at` is null (the marker is the only "already submitted" key),
 * - it was recorded by the player itself (`source = 'player'`),
 * - it played for more than 30 seconds.
 *
 * ## SQL Patterns
 *
 * ```sql
 * -- Next page of eligible listens after the cursor
 * SELECT * FROM listens
 * WHERE scrobbled_at IS NULL AND source = 'player'
 *   AND strftime('%s', completed_at) - strftime('%s', started_at) > 30
 *   AND id > ?
 * ORDER BY id ASC LIMIT ?
 *
 * -- Mark accepted listens
 * UPDATE listens SET scrobbled_at = ? WHERE id IN (...) AND scrobbled_at IS NULL
 * ```
 */

import { and, asc, eq, gt, inArray, isNotNull, isNull, sql } from 'drizzle-orm'
import { listens, SELF_SOURCE, type ListenRow, type ListenSource } from './schema'
import { createListen, toUnixSeconds, type Listen } from '../types/listen'
import type { PairedListen } from '../types/playback-event'
import { chunks } from '../lib/batching'
import type { Store } from './index'

/** Services count a listen only after 30 seconds of playback */
export const MIN_PLAY_SECONDS = 30

/** Rows fetched per query while iterating eligible listens */
export const DEFAULT_PAGE_SIZE = 100

// SQLite caps host parameters per statement; stay well below it.
const MARK_CHUNK_SIZE = 500

export interface EligibleListenOptions {
  /** Only listens that started strictly after this instant */
  since?: Date
  pageSize?: number
}

const startedAtSeconds = sql<number>`cast(strftime('%s', ${listens.startedAt}) as integer)`
const completedAtSeconds = sql<number>`cast(strftime('%s', ${listens.completedAt}) as integer)`

/**
 * Lazily iterate eligible listens in ascending id order.
 *
 * Rows are fetched a page at a time with an id cursor, so no statement is
 * open while the caller marks listens between pages. Listens marked in the
 * meantime simply stop matching.
 */
export function* iterEligibleListens(
  store: Store,
  options: EligibleListenOptions = {},
): Generator<Listen, void, undefined> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
  const sinceSeconds = options.since ? toUnixSeconds(options.since) : null
  let cursor: number | null = null

  while (true) {
    const rows: ListenRow[] = store.db
      .select()
      .from(listens)
      .where(
        and(
          isNull(listens.scrobbledAt),
          eq(listens.source, SELF_SOURCE),
          isNotNull(listens.completedAt),
          sql`${completedAtSeconds} - ${startedAtSeconds} > ${MIN_PLAY_SECONDS}`,
          sinceSeconds !== null ? sql`${startedAtSeconds} > ${sinceSeconds}` : undefined,
          cursor !== null ? gt(listens.id, cursor) : undefined,
        ),
      )
      .orderBy(asc(listens.id))
      .limit(pageSize)
      .all()

    for (const row of rows) {
      cursor = row.id
      yield rowToListen(row)
    }

    if (rows.length < pageSize) {
      return
    }
  }
}

/**
 * Build a Listen from a row of the listens table.
 *
 * @throws ValidationError when a stored timestamp has no UTC offset
 */
export function rowToListen(row: ListenRow): Listen {
  return createListen({
    id: row.id,
    startedAt: row.startedAt,
    // Eligible rows always have one; an empty string fails validation otherwise.
    completedAt: row.completedAt ?? '',
    trackTitle: row.trackTitle,
    albumTitle: row.albumTitle,
    trackArtist: row.trackArtist,
    albumArtist: row.albumArtist,
    durationSeconds: row.durationSeconds,
    trackNumber: row.trackNumber,
    discNumber: row.discNumber,
    recordingMbid: row.recordingMbid,
    releaseMbid: row.releaseMbid,
  })
}

/**
 * Set `scrobbled_at` for exactly the given ids, in one transaction.
 *
 * Listens that already carry a marker keep it, so calling this again with
 * the same ids changes nothing.
 *
 * @returns number of listens that were marked by this call
 */
export function markScrobbled(store: Store, ids: readonly number[], now: Date): number {
  if (ids.length === 0) {
    return 0
  }

  const scrobbledAt = now.toISOString()

  return store.db.transaction((tx) => {
    let changed = 0
    for (const group of chunks(ids, MARK_CHUNK_SIZE)) {
      const result = tx
        .update(listens)
        .set({ scrobbledAt })
        .where(and(inArray(listens.id, group), isNull(listens.scrobbledAt)))
        .run()
      changed += result.changes
    }
    return changed
  })
}

/**
 * Insert a listen reconstructed from the play log.
 *
 * Listens whose start second is already present are ignored.
 *
 * @returns true when a new row was written
 */
export function insertPairedListen(store: Store, listen: PairedListen, source: ListenSource = SELF_SOURCE): boolean {
  const result = store.db
    .insert(listens)
    .values({
      startedAt: listen.startedAt.toISOString(),
      completedAt: listen.completedAt.toISOString(),
      queueId: listen.queueId,
      trackId: listen.trackId,
      albumId: listen.albumId,
      albumArtistId: listen.albumArtistId,
      trackTitle: listen.trackTitle,
      albumTitle: listen.albumTitle,
      trackArtist: listen.trackArtist,
      albumArtist: listen.albumArtist,
      durationSeconds: listen.durationSeconds,
      trackNumber: listen.trackNumber,
      discNumber: listen.discNumber,
      source,
    })
    .onConflictDoNothing()
    .run()

  return result.changes === 1
}
