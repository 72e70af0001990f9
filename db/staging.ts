/**
 * @module db/staging
 *
 * Staging area for listening history imported from Last.fm.
 *
 * Pages of one import overlap when new listens arrive while paging, and
 * incremental imports overlap with earlier runs. Rows are therefore written
 * insert-or-ignore on the natural key (timestamp, title, artist, album).
 */

import { count, desc, gte } from 'drizzle-orm'
import { lastfmListens, type NewStagingRow } from './schema'
import type { Store } from './index'

/**
 * Write one page of imported listens in a single transaction.
 *
 * @returns number of rows that were new
 */
export function upsertStagingPage(store: Store, rows: readonly NewStagingRow[]): number {
  return store.db.transaction((tx) => {
    let inserted = 0
    for (const row of rows) {
      inserted += tx.insert(lastfmListens).values(row).onConflictDoNothing().run().changes
    }
    return inserted
  })
}

/**
 * Number of staged listens at or after `sinceSeconds` (all of them when null).
 *
 * Inclusive like the `from` parameter of `user.getRecentTracks`, so the
 * result is comparable with the total Last.fm reports for the same bound.
 * An incremental import starts at the newest staged listen, which Last.fm
 * returns again and counts in its total.
 */
export function countStaged(store: Store, sinceSeconds: number | null): number {
  const row = store.db
    .select({ value: count() })
    .from(lastfmListens)
    .where(sinceSeconds !== null ? gte(lastfmListens.secondsSinceEpoch, sinceSeconds) : undefined)
    .get()
  return row?.value ?? 0
}

/**
 * Timestamp of the most recent staged listen, in seconds since the epoch.
 */
export function newestStagedSeconds(store: Store): number | null {
  const row = store.db
    .select({ seconds: lastfmListens.secondsSinceEpoch })
    .from(lastfmListens)
    .orderBy(desc(lastfmListens.secondsSinceEpoch))
    .limit(1)
    .get()
  return row?.seconds ?? null
}
