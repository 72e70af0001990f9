/**
 * Reconstructs listens from a stream of playback events.
 *
 * The pairer keeps only the previous event. A listen is emitted when a
 * `completed` event directly follows the `started` event of the same queue
 * entry and track, the time between them matches the declared duration
 * within 10 seconds, and the track is longer than 30 seconds. Anything
 * else (skips, seeks, pauses, a `started` with no completion) yields nothing.
 */

import type { PairedListen, PlaybackEvent } from '../types/playback-event'

/** Allowed difference between wall-clock play time and declared duration */
export const MAX_DURATION_DRIFT_SECONDS = 10

/** Tracks this short are never counted as listens */
export const MIN_TRACK_SECONDS = 30

export function pairEvents(prev: PlaybackEvent, cur: PlaybackEvent): PairedListen | null {
  if (prev.kind !== 'started' || cur.kind !== 'completed') return null
  if (prev.queueId !== cur.queueId || prev.trackId !== cur.trackId) return null

  const elapsedSeconds = (cur.time.getTime() - prev.time.getTime()) / 1000
  if (Math.abs(elapsedSeconds - prev.durationSeconds) > MAX_DURATION_DRIFT_SECONDS) return null
  if (prev.durationSeconds <= MIN_TRACK_SECONDS) return null

  return {
    startedAt: prev.time,
    completedAt: cur.time,
    queueId: prev.queueId,
    trackId: prev.trackId,
    albumId: prev.albumId,
    albumArtistId: prev.albumArtistId,
    trackTitle: prev.trackTitle,
    albumTitle: prev.albumTitle,
    trackArtist: prev.trackArtist,
    albumArtist: prev.albumArtist,
    durationSeconds: prev.durationSeconds,
    trackNumber: prev.trackNumber,
    discNumber: prev.discNumber,
  }
}

export async function* pairPlaybackEvents(
  events: Iterable<PlaybackEvent> | AsyncIterable<PlaybackEvent>,
): AsyncGenerator<PairedListen, void, undefined> {
  let prev: PlaybackEvent | null = null

  for await (const cur of events) {
    if (prev !== null) {
      const listen = pairEvents(prev, cur)
      if (listen !== null) {
        yield listen
      }
    }
    prev = cur
  }
}
