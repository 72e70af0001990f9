/**
 * Last.fm History Import Tests
 *
 * Runs the import against an in-memory store and a scripted history source.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { importHistory, importLowerBound, toStagingRow, type HistorySource } from './history-import'
import { LastfmClient, type RecentTracksQuery } from './lastfm-client'
import { TEST_LASTFM_CONFIG, createFetchMock, jsonResponse } from './test-utils'
import { DAY_MS } from './constants'
import { ImportAbortedError, InvariantError, NetworkError, ValidationError } from '../cli/utils/errors'
import { createLogger } from '../cli/utils/logger'
import { createTestStore } from '../db/test-utils'
import { upsertStagingPage } from '../db/staging'
import { lastfmListens } from '../db/schema'
import type { Store } from '../db'
import type { RecentTrack, RecentTracksPage } from '../types/lastfm'

let store: Store
const logger = createLogger('history', { silent: true })
const now = new Date('2024-03-01T00:00:00.000Z')
const nowSeconds = now.getTime() / 1000

beforeEach(() => {
  store = createTestStore()
})

afterEach(() => {
  store.close()
})

function recentTrack(uts: number, overrides: Partial<RecentTrack> = {}): RecentTrack {
  return {
    name: `Track ${uts}`,
    mbid: '',
    artist: { '#text': 'Artist', mbid: '' },
    album: { '#text': 'Album', mbid: '' },
    date: { uts },
    ...overrides,
  }
}

/** Page `page` of a history of `pageSize` distinct listens per page, newest first */
function historyPage(page: number, totalPages: number, total: number, pageSize = 200): RecentTracksPage {
  const newest = 1_700_000_000 - (page - 1) * pageSize
  return {
    page,
    totalPages,
    total,
    tracks: Array.from({ length: pageSize }, (_, i) => recentTrack(newest - i)),
  }
}

function scriptedSource(respond: (query: RecentTracksQuery) => Promise<RecentTracksPage>) {
  const getRecentTracks = vi.fn(respond)
  const source: HistorySource = { getRecentTracks }
  return { source, getRecentTracks }
}

function stagedRows() {
  return store.db.select().from(lastfmListens).orderBy(lastfmListens.id).all()
}

const noSleep = () => vi.fn(async (_ms: number) => {})

// ============================================================================
// Paging
// ============================================================================

describe('importHistory', () => {
  it('stops once the staged count matches the reported total', async () => {
    const { source, getRecentTracks } = scriptedSource(async ({ page }) => historyPage(page, 10, 600))

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })

    expect(getRecentTracks).toHaveBeenCalledTimes(3)
    expect(getRecentTracks.mock.calls.map(([query]) => query.page)).toEqual([1, 2, 3])
    expect(summary).toEqual({ since: null, pages: 3, imported: 600, total: 600, local: 600, converged: true })
  })

  it('stops after the last page even when the counts never match', async () => {
    const { source, getRecentTracks } = scriptedSource(async ({ page }) => historyPage(page, 2, 1000, 1))

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })

    expect(getRecentTracks).toHaveBeenCalledTimes(2)
    expect(summary.converged).toBe(false)
    expect(summary.local).toBe(2)
  })

  it('makes a single call for an empty history', async () => {
    const { source, getRecentTracks } = scriptedSource(async () => ({ page: 1, totalPages: 0, total: 0, tracks: [] }))

    const summary = await importHistory(store, source, { user: 'test-user', now, logger })

    expect(getRecentTracks).toHaveBeenCalledTimes(1)
    expect(summary.pages).toBe(1)
  })

  it('reads from 30 days ago for an incremental import into an empty table', async () => {
    const { source, getRecentTracks } = scriptedSource(async () => ({ page: 1, totalPages: 0, total: 0, tracks: [] }))

    await importHistory(store, source, { user: 'test-user', mode: 'incremental', now, logger })

    expect(getRecentTracks).toHaveBeenCalledWith({ user: 'test-user', page: 1, from: nowSeconds - 30 * 86400 })
  })

  it('does not re-import the same listens on a second run', async () => {
    const { source } = scriptedSource(async ({ page }) => historyPage(page, 1, 200))

    const first = await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })
    const second = await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })

    expect(first.imported).toBe(200)
    expect(second.imported).toBe(0)
    expect(stagedRows()).toHaveLength(200)
  })

  it('converges when the newest staged listen is the lower bound and nothing is new', async () => {
    const newest = nowSeconds - 3600
    upsertStagingPage(store, [{ secondsSinceEpoch: newest, title: `Track ${newest}`, trackArtist: 'Artist', album: 'Album' }])
    const { source, getRecentTracks } = scriptedSource(async ({ page }) => ({
      page,
      totalPages: 1,
      total: 1,
      tracks: [recentTrack(newest)],
    }))

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'incremental', now, logger })

    expect(getRecentTracks).toHaveBeenCalledWith({ user: 'test-user', page: 1, from: newest })
    expect(summary).toEqual({ since: newest, pages: 1, imported: 0, total: 1, local: 1, converged: true })
  })

  it('skips the track that is playing right now', async () => {
    const playing = recentTrack(0, { date: undefined, '@attr': { nowplaying: 'true' } })
    const { source } = scriptedSource(async () => ({
      page: 1,
      totalPages: 1,
      total: 1,
      tracks: [playing, recentTrack(1_700_000_000)],
    }))

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })

    expect(summary.imported).toBe(1)
    expect(summary.converged).toBe(true)
  })

  it('repairs mis-decoded text before staging it', async () => {
    const { source } = scriptedSource(async () => ({
      page: 1,
      totalPages: 1,
      total: 1,
      tracks: [
        recentTrack(1_700_000_000, {
          name: 'CafÃ©',
          artist: { '#text': 'BjÃ¶rk', mbid: 'artist-1' },
          album: { '#text': 'Album', mbid: '' },
        }),
      ],
    }))

    await importHistory(store, source, { user: 'test-user', mode: 'full', now, logger })

    const [row] = stagedRows()
    expect(row).toMatchObject({
      secondsSinceEpoch: 1_700_000_000,
      title: 'Café',
      trackArtist: 'Björk',
      album: 'Album',
      trackMbid: null,
      artistMbid: 'artist-1',
      albumMbid: null,
    })
  })
})

// ============================================================================
// Retries
// ============================================================================

describe('importHistory retries', () => {
  it('retries a failed page after a fixed delay', async () => {
    let calls = 0
    const { source, getRecentTracks } = scriptedSource(async ({ page }) => {
      calls++
      if (calls <= 2) {
        throw NetworkError.httpError(500, 'https://example.test/', 'oops')
      }
      return historyPage(page, 1, 200)
    })
    const sleep = noSleep()

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'full', now, sleep, logger })

    expect(getRecentTracks).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[5000], [5000]])
    expect(summary.converged).toBe(true)
  })

  it('retries a page whose connection dropped while the body was read', async () => {
    let calls = 0
    const fetchFn = createFetchMock(() => {
      calls++
      const response = jsonResponse({
        recenttracks: {
          track: [
            {
              name: 'Song',
              mbid: '',
              artist: { '#text': 'Artist', mbid: '' },
              album: { '#text': 'Album', mbid: '' },
              date: { uts: '1700000000' },
            },
          ],
          '@attr': { user: 'test-user', page: '1', perPage: '200', totalPages: '1', total: '1' },
        },
      })
      if (calls === 1) {
        vi.spyOn(response, 'text').mockRejectedValue(new TypeError('terminated'))
      }
      return response
    })
    const client = new LastfmClient({ config: TEST_LASTFM_CONFIG, fetchFn, logger })
    const sleep = noSleep()

    const summary = await importHistory(store, client, { user: 'test-user', mode: 'full', now, sleep, logger })

    expect(fetchFn).toHaveBeenCalledTimes(2)
    expect(sleep.mock.calls).toEqual([[5000]])
    expect(summary).toMatchObject({ imported: 1, local: 1, total: 1, converged: true })
  })

  it('retries a page whose body could not be decoded', async () => {
    let calls = 0
    const { source } = scriptedSource(async ({ page }) => {
      calls++
      if (calls === 1) {
        throw InvariantError.malformedResponse('recenttracks: Required', '{}')
      }
      return historyPage(page, 1, 200)
    })

    const summary = await importHistory(store, source, { user: 'test-user', mode: 'full', now, sleep: noSleep(), logger })

    expect(summary.imported).toBe(200)
  })

  it('aborts after ten consecutive failures of the same page', async () => {
    const { source, getRecentTracks } = scriptedSource(async () => {
      throw NetworkError.connectionFailed('https://example.test/')
    })
    const sleep = noSleep()

    const error = await importHistory(store, source, { user: 'test-user', mode: 'full', now, sleep, logger }).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(ImportAbortedError)
    if (error instanceof ImportAbortedError) {
      expect(error.page).toBe(1)
      expect(error.failures).toBe(10)
      expect(error.cause).toBeInstanceOf(NetworkError)
    }
    expect(getRecentTracks).toHaveBeenCalledTimes(10)
    expect(sleep).toHaveBeenCalledTimes(9)
  })

  it('keeps the pages staged before an abort', async () => {
    const { source } = scriptedSource(async ({ page }) => {
      if (page === 2) {
        throw NetworkError.connectionFailed('https://example.test/')
      }
      return historyPage(page, 2, 400)
    })

    const error = await importHistory(store, source, {
      user: 'test-user',
      mode: 'full',
      now,
      sleep: noSleep(),
      maxConsecutiveFailures: 3,
      logger,
    }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ImportAbortedError)
    if (error instanceof ImportAbortedError) {
      expect(error.page).toBe(2)
      expect(error.failures).toBe(3)
    }
    expect(stagedRows()).toHaveLength(200)
  })

  it('does not retry errors that are not transient', async () => {
    const { source, getRecentTracks } = scriptedSource(async () => {
      throw ValidationError.invalidArgument('user', 'a Last.fm user name')
    })

    await expect(
      importHistory(store, source, { user: 'test-user', mode: 'full', now, sleep: noSleep(), logger }),
    ).rejects.toBeInstanceOf(ValidationError)
    expect(getRecentTracks).toHaveBeenCalledTimes(1)
  })
})

// ============================================================================
// Helpers
// ============================================================================

describe('importLowerBound', () => {
  it('has no lower bound for a full import', () => {
    expect(importLowerBound(store, 'full', now)).toBeNull()
  })

  it('uses the newest staged listen when it is inside the window', () => {
    const newest = nowSeconds - 86400
    upsertStagingPage(store, [{ secondsSinceEpoch: newest, title: 'T', trackArtist: 'A', album: 'B' }])

    expect(importLowerBound(store, 'incremental', now)).toBe(newest)
  })

  it('uses the window start when the newest staged listen is older', () => {
    upsertStagingPage(store, [{ secondsSinceEpoch: nowSeconds - 90 * 86400, title: 'T', trackArtist: 'A', album: 'B' }])

    expect(importLowerBound(store, 'incremental', now)).toBe(nowSeconds - 30 * 86400)
  })

  it('honours a custom window', () => {
    expect(importLowerBound(store, 'incremental', now, 7)).toBe((now.getTime() - 7 * DAY_MS) / 1000)
  })
})

describe('toStagingRow', () => {
  it('returns null for a track without a date', () => {
    expect(toStagingRow(recentTrack(1, { date: undefined }))).toBeNull()
  })

  it('turns empty MusicBrainz ids into null', () => {
    expect(toStagingRow(recentTrack(5, { mbid: 'track-1' }))).toEqual({
      secondsSinceEpoch: 5,
      title: 'Track 5',
      trackArtist: 'Artist',
      album: 'Album',
      trackMbid: 'track-1',
      artistMbid: null,
      albumMbid: null,
    })
  })
})
