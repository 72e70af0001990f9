/**
 * Last.fm Wire Types
 *
 * Last.fm derives its JSON from an XML API: an element that repeats becomes a
 * list, but a single occurrence becomes a bare object. Every schema for such
 * an element accepts both shapes and the decoders in this module always
 * hand a list to the caller.
 *
 * @module types/lastfm
 */

import { z } from 'zod'

// ============================================================================
// SHARED
// ============================================================================

/**
 * Counters arrive as numbers in some responses and numeric strings in others
 */
export const CountSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number),
])

/**
 * Accept a repeated element in either of its shapes
 */
export function oneOrMany<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), item])
}

/**
 * The list form of a repeated element
 */
export function asList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value]
}

export const LastfmErrorSchema = z.object({
  error: z.number().int(),
  message: z.string(),
})

export type LastfmErrorPayload = z.infer<typeof LastfmErrorSchema>

// ============================================================================
// track.scrobble
// ============================================================================

export const ScrobbleItemSchema = z
  .object({
    ignoredMessage: z.object({
      code: z.string(),
      '#text': z.string().optional(),
    }),
  })
  .passthrough()

export type ScrobbleItem = z.infer<typeof ScrobbleItemSchema>

export const ScrobbleResponseSchema = z.object({
  scrobbles: z.object({
    scrobble: oneOrMany(ScrobbleItemSchema),
    '@attr': z.object({
      accepted: CountSchema,
      ignored: CountSchema,
    }),
  }),
})

/**
 * A scrobble response after shape normalization
 */
export interface ScrobbleBatchResult {
  /** Batch-level accepted counter */
  accepted: number
  ignored: number
  /** Per-item results, in submission order */
  items: ScrobbleItem[]
}

// ============================================================================
// user.getRecentTracks
// ============================================================================

const TextWithMbidSchema = z.object({
  '#text': z.string().default(''),
  mbid: z.string().default(''),
})

export const RecentTrackSchema = z.object({
  name: z.string(),
  mbid: z.string().default(''),
  artist: TextWithMbidSchema,
  album: TextWithMbidSchema,
  /** Absent on the track that is playing right now */
  date: z.object({ uts: CountSchema }).optional(),
  '@attr': z.object({ nowplaying: z.string().optional() }).optional(),
})

export type RecentTrack = z.infer<typeof RecentTrackSchema>

export const RecentTracksResponseSchema = z.object({
  recenttracks: z.object({
    track: oneOrMany(RecentTrackSchema).default([]),
    '@attr': z.object({
      user: z.string(),
      page: CountSchema,
      perPage: CountSchema,
      totalPages: CountSchema,
      total: CountSchema,
    }),
  }),
})

/**
 * One page of a user's listening history after shape normalization
 */
export interface RecentTracksPage {
  page: number
  totalPages: number
  /** Number of listens in the requested range, over all pages */
  total: number
  tracks: RecentTrack[]
}

// ============================================================================
// auth.getToken / auth.getSession
// ============================================================================

export const TokenResponseSchema = z.object({
  token: z.string().min(1),
})

export const SessionResponseSchema = z.object({
  session: z.object({
    name: z.string(),
    key: z.string().min(1),
  }),
})

export interface LastfmSession {
  name: string
  key: string
}
