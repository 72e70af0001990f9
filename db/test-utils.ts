/**
 * Test Utilities for the Listens Store
 *
 * Creates in-memory SQLite stores with the relay schema, and seeds listens
 * with sensible defaults so tests only spell out what they care about.
 *
 * @module db/test-utils
 */

import { eq } from 'drizzle-orm'
import { openStore, type Store } from './index'
import { listens, type ListenRow, type NewListenRow } from './schema'
import { createLogger } from '../cli/utils/logger'

/**
 * Creates a store backed by a fresh in-memory database.
 */
export function createTestStore(): Store {
  return openStore(':memory:', { logger: createLogger('db', { silent: true }) })
}

/** 2024-01-01T00:00:00Z */
export const BASE_EPOCH_SECONDS = 1_704_067_200

/**
 * ISO string for `BASE_EPOCH_SECONDS + offsetSeconds`, in UTC.
 */
export function isoAt(offsetSeconds: number): string {
  return new Date((BASE_EPOCH_SECONDS + offsetSeconds) * 1000).toISOString()
}

/**
 * Insert a listen. Listen `n` (1-based) starts n hours after the base time
 * and plays for 200 seconds unless overridden.
 *
 * @returns the new row id
 */
export function insertListen(store: Store, n: number, overrides: Partial<NewListenRow> = {}): number {
  const start = n * 3600
  const row: NewListenRow = {
    startedAt: isoAt(start),
    completedAt: isoAt(start + 200),
    queueId: n,
    trackId: 1000 + n,
    albumId: 10,
    albumArtistId: 20,
    trackTitle: `Track ${n}`,
    albumTitle: 'Album',
    trackArtist: 'Artist',
    albumArtist: 'Artist',
    durationSeconds: 200,
    trackNumber: n,
    discNumber: 1,
    source: 'player',
    ...overrides,
  }

  const result = store.db.insert(listens).values(row).run()
  return Number(result.lastInsertRowid)
}

/**
 * Insert listens 1..count with default values.
 *
 * @returns the new row ids, ascending
 */
export function seedListens(store: Store, listenCount: number): number[] {
  const ids: number[] = []
  for (let n = 1; n <= listenCount; n++) {
    ids.push(insertListen(store, n))
  }
  return ids
}

export function getListenRow(store: Store, id: number): ListenRow | undefined {
  return store.db.select().from(listens).where(eq(listens.id, id)).get()
}

export function getAllListenRows(store: Store): ListenRow[] {
  return store.db.select().from(listens).orderBy(listens.id).all()
}
