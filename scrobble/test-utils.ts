/**
 * Test Utilities for the Submission Clients
 *
 * Listen factories and canned service responses.
 *
 * @module scrobble/test-utils
 */

import { vi } from 'vitest'
import { createListen, type Listen, type ListenFields } from '../types/listen'
import { isoAt } from '../db/test-utils'
import type { LastfmConfig } from '../cli/utils/config'

export const TEST_LASTFM_CONFIG: LastfmConfig = {
  apiKey: 'test-key',
  secret: 'test-secret',
  sessionKey: 'test-session',
  user: 'test-user',
}

/**
 * Listen `id` starting `id` hours after the base time, lasting 200 seconds
 */
export function makeListen(id: number, overrides: Partial<ListenFields> = {}): Listen {
  return createListen({
    id,
    startedAt: isoAt(id * 3600),
    completedAt: isoAt(id * 3600 + 200),
    trackTitle: `Track ${id}`,
    albumTitle: 'Album',
    trackArtist: 'Artist',
    albumArtist: 'Artist',
    durationSeconds: 200,
    trackNumber: id,
    discNumber: 1,
    ...overrides,
  })
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init })
}

/**
 * A `track.scrobble` response with one item per code, `'0'` meaning accepted
 */
export function scrobbleResponseBody(codes: string[], accepted = codes.filter((code) => code === '0').length) {
  const items = codes.map((code) => ({
    track: { corrected: '0', '#text': 'Track' },
    ignoredMessage: { code, '#text': code === '0' ? '' : 'Artist ignored' },
  }))
  return {
    scrobbles: {
      scrobble: items.length === 1 ? items[0] : items,
      '@attr': { accepted, ignored: codes.length - accepted },
    },
  }
}

/**
 * Number of entries in an encoded `track.scrobble` body
 */
export function scrobbleEntryCount(body: string): number {
  return [...new URLSearchParams(body).keys()].filter((key) => key.startsWith('artist[')).length
}

/**
 * Mock fetch answering with whatever `respond` returns
 */
export function createFetchMock(respond: (url: string, init: RequestInit) => Response | Promise<Response>) {
  return vi.fn(async (url: string, init: RequestInit) => respond(url, init))
}

/**
 * The request body of a recorded fetch call, as a string
 */
export function bodyOf(init: RequestInit | undefined): string {
  return typeof init?.body === 'string' ? init.body : ''
}
