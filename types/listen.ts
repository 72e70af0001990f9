/**
 * Listen Types
 *
 * A listen is one completed playback of a track, as recorded by the player.
 * Both of its timestamps are absolute instants: they are parsed from ISO-8601
 * strings that carry `Z` or an explicit UTC offset, and construction fails
 * for strings without one.
 *
 * @module types/listen
 */

import { z } from 'zod'
import { ValidationError } from '../cli/utils/errors'

// ============================================================================
// ZOD SCHEMAS - Runtime validation
// ============================================================================

/**
 * ISO-8601 timestamp with a mandatory `Z` or `±HH:MM` suffix
 */
export const OffsetTimestampSchema = z.string().datetime({ offset: true })

export const ListenFieldsSchema = z.object({
  id: z.number().int(),
  startedAt: OffsetTimestampSchema,
  completedAt: OffsetTimestampSchema,
  trackTitle: z.string(),
  albumTitle: z.string(),
  trackArtist: z.string(),
  albumArtist: z.string(),
  durationSeconds: z.number().int().nonnegative(),
  trackNumber: z.number().int().nullable(),
  discNumber: z.number().int().nullable(),
  recordingMbid: z.string().nullable().optional(),
  releaseMbid: z.string().nullable().optional(),
})

export type ListenFields = z.input<typeof ListenFieldsSchema>

// ============================================================================
// LISTEN
// ============================================================================

export interface Listen {
  /** Store-assigned identity */
  readonly id: number
  readonly startedAt: Date
  readonly completedAt: Date
  readonly trackTitle: string
  readonly albumTitle: string
  readonly trackArtist: string
  readonly albumArtist: string
  readonly durationSeconds: number
  readonly trackNumber: number | null
  readonly discNumber: number | null
  /** MusicBrainz recording id, when known */
  readonly recordingMbid: string | null
  /** MusicBrainz release id, when known */
  readonly releaseMbid: string | null
}

/**
 * Parse a timestamp that must carry timezone information.
 *
 * @throws ValidationError for naive or malformed timestamps
 */
export function parseOffsetTimestamp(value: string, field: string): Date {
  if (!OffsetTimestampSchema.safeParse(value).success) {
    throw ValidationError.invalidFormat(field, 'ISO-8601 timestamp with Z or a UTC offset', value)
  }
  return new Date(value)
}

/**
 * Build a Listen from raw field values.
 *
 * @throws ValidationError when a timestamp lacks timezone information or a field is malformed
 */
export function createListen(fields: ListenFields): Listen {
  const startedAt = parseOffsetTimestamp(fields.startedAt, 'startedAt')
  const completedAt = parseOffsetTimestamp(fields.completedAt, 'completedAt')

  const parsed = ListenFieldsSchema.safeParse(fields)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw ValidationError.invalidFormat(issue ? issue.path.join('.') : 'listen', issue ? issue.message : 'valid listen')
  }

  const listen = parsed.data
  return {
    id: listen.id,
    startedAt,
    completedAt,
    trackTitle: listen.trackTitle,
    albumTitle: listen.albumTitle,
    trackArtist: listen.trackArtist,
    albumArtist: listen.albumArtist,
    durationSeconds: listen.durationSeconds,
    trackNumber: listen.trackNumber,
    discNumber: listen.discNumber,
    recordingMbid: listen.recordingMbid ?? null,
    releaseMbid: listen.releaseMbid ?? null,
  }
}

/**
 * Seconds since the Unix epoch, truncated (remote services have second granularity)
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000)
}
