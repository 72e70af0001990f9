/**
 * Playback Event Pairing Tests
 */

import { describe, it, expect } from 'vitest'
import { pairPlaybackEvents, pairEvents } from './event-pairer'
import type { PairedListen, PlaybackEvent, PlaybackEventKind } from '../types/playback-event'

const T0 = Date.parse('2024-01-05T20:00:00.000Z')

interface QueuedTrack {
  queueId: number
  trackId: number
  durationSeconds: number
  title?: string
}

function event(kind: PlaybackEventKind, atSeconds: number, track: QueuedTrack): PlaybackEvent {
  return {
    kind,
    time: new Date(T0 + atSeconds * 1000),
    queueId: track.queueId,
    trackId: track.trackId,
    albumId: 10,
    albumArtistId: 20,
    trackTitle: track.title ?? `Track ${track.trackId}`,
    albumTitle: 'Album',
    trackArtist: 'Artist',
    albumArtist: 'Artist',
    durationSeconds: track.durationSeconds,
    trackNumber: 1,
    discNumber: null,
  }
}

async function collect(events: Iterable<PlaybackEvent> | AsyncIterable<PlaybackEvent>): Promise<PairedListen[]> {
  const listens: PairedListen[] = []
  for await (const listen of pairPlaybackEvents(events)) {
    listens.push(listen)
  }
  return listens
}

const A: QueuedTrack = { queueId: 1, trackId: 100, durationSeconds: 40, title: 'A' }
const B: QueuedTrack = { queueId: 2, trackId: 200, durationSeconds: 200, title: 'B' }
const C: QueuedTrack = { queueId: 3, trackId: 300, durationSeconds: 20, title: 'C' }

describe('pairPlaybackEvents', () => {
  it('emits only the complete, full-length play from a mixed stream', async () => {
    const listens = await collect([
      event('started', 0, A),
      event('completed', 41, A),
      event('started', 100, B),
      event('started', 110, C),
      event('completed', 130, C),
    ])

    expect(listens).toHaveLength(1)
    expect(listens[0]?.trackTitle).toBe('A')
  })

  it('takes metadata and start time from the started event and completion time from the completed event', async () => {
    const started = event('started', 0, B)
    const completed = { ...event('completed', 205, B), trackTitle: 'renamed later' }

    const [listen] = await collect([started, completed])

    expect(listen).toEqual({
      startedAt: new Date(T0),
      completedAt: new Date(T0 + 205_000),
      queueId: 2,
      trackId: 200,
      albumId: 10,
      albumArtistId: 20,
      trackTitle: 'B',
      albumTitle: 'Album',
      trackArtist: 'Artist',
      albumArtist: 'Artist',
      durationSeconds: 200,
      trackNumber: 1,
      discNumber: null,
    })
  })

  it('accepts a drift of exactly ten seconds', async () => {
    expect(await collect([event('started', 0, B), event('completed', 210, B)])).toHaveLength(1)
    expect(await collect([event('started', 0, B), event('completed', 190, B)])).toHaveLength(1)
  })

  it('drops plays that were paused or skipped through', async () => {
    expect(await collect([event('started', 0, B), event('completed', 211, B)])).toEqual([])
    expect(await collect([event('started', 0, B), event('completed', 120, B)])).toEqual([])
  })

  it('drops completions that belong to a different queue entry or track', async () => {
    const otherQueue = { ...B, queueId: 9 }
    const otherTrack = { ...B, trackId: 999 }

    expect(await collect([event('started', 0, B), event('completed', 200, otherQueue)])).toEqual([])
    expect(await collect([event('started', 0, B), event('completed', 200, otherTrack)])).toEqual([])
  })

  it('drops tracks of 30 seconds or less', async () => {
    const short = { ...B, durationSeconds: 30 }
    expect(await collect([event('started', 0, short), event('completed', 30, short)])).toEqual([])
  })

  it('pairs consecutive plays', async () => {
    const listens = await collect([
      event('started', 0, A),
      event('completed', 40, A),
      event('started', 40, B),
      event('completed', 240, B),
    ])

    expect(listens.map((listen) => listen.trackTitle)).toEqual(['A', 'B'])
  })

  it('reads asynchronous sources', async () => {
    async function* source(): AsyncGenerator<PlaybackEvent> {
      yield event('started', 0, A)
      yield event('completed', 40, A)
    }

    expect(await collect(source())).toHaveLength(1)
  })

  it('emits nothing for an empty stream', async () => {
    expect(await collect([])).toEqual([])
  })
})

describe('pairEvents', () => {
  it('requires a started event followed by a completed event', () => {
    expect(pairEvents(event('completed', 0, B), event('started', 200, B))).toBeNull()
    expect(pairEvents(event('started', 0, B), event('started', 200, B))).toBeNull()
    expect(pairEvents(event('started', 0, B), event('completed', 200, B))).not.toBeNull()
  })
})
