/**
 * Playback Event Types
 *
 * The legacy play log is a JSON-lines file, one event per line, appended by
 * the player when a track starts and when it completes:
 *
 * ```json
 * {"event":"started","time":"2021-03-04T20:15:00Z","queue_id":7,"track_id":1201,...}
 * {"event":"completed","time":"2021-03-04T20:19:02Z","queue_id":7,"track_id":1201,...}
 * ```
 *
 * @module types/playback-event
 */

import { z } from 'zod'
import { OffsetTimestampSchema } from './listen'

export const PlaybackEventKindSchema = z.enum(['started', 'completed'])

export type PlaybackEventKind = z.infer<typeof PlaybackEventKindSchema>

/**
 * One play log line, as written to disk
 */
export const PlaybackEventLineSchema = z.object({
  event: PlaybackEventKindSchema,
  time: OffsetTimestampSchema,
  queue_id: z.number().int(),
  track_id: z.number().int(),
  album_id: z.number().int(),
  album_artist_id: z.number().int(),
  title: z.string(),
  album: z.string(),
  artist: z.string(),
  album_artist: z.string(),
  duration_seconds: z.number().int().nonnegative(),
  track_number: z.number().int().nullable().default(null),
  disc_number: z.number().int().nullable().default(null),
})

export type PlaybackEventLine = z.infer<typeof PlaybackEventLineSchema>

export interface PlaybackEvent {
  kind: PlaybackEventKind
  time: Date
  queueId: number
  trackId: number
  albumId: number
  albumArtistId: number
  trackTitle: string
  albumTitle: string
  trackArtist: string
  albumArtist: string
  /** Duration the track declares, not how long it played */
  durationSeconds: number
  trackNumber: number | null
  discNumber: number | null
}

/**
 * A listen reconstructed from a started/completed pair. Carries no store
 * identity yet; it gets one when it is written to the listens table.
 */
export interface PairedListen {
  startedAt: Date
  completedAt: Date
  queueId: number
  trackId: number
  albumId: number
  albumArtistId: number
  trackTitle: string
  albumTitle: string
  trackArtist: string
  albumArtist: string
  durationSeconds: number
  trackNumber: number | null
  discNumber: number | null
}

export function toPlaybackEvent(line: PlaybackEventLine): PlaybackEvent {
  return {
    kind: line.event,
    time: new Date(line.time),
    queueId: line.queue_id,
    trackId: line.track_id,
    albumId: line.album_id,
    albumArtistId: line.album_artist_id,
    trackTitle: line.title,
    albumTitle: line.album,
    trackArtist: line.artist,
    albumArtist: line.album_artist,
    durationSeconds: line.duration_seconds,
    trackNumber: line.track_number,
    discNumber: line.disc_number,
  }
}
