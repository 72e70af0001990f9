/**
 * @module db/schema
 *
 * Tables the relay reads and writes.
 *
 * - `listens` belongs to the player that records playback. The relay reads
 *   eligible rows and sets `scrobbled_at`; it never changes anything else in
 *   a row. Timestamps are ISO-8601 strings with a UTC offset.
 * - `lastfm_listens` is the staging area for history imported from Last.fm.
 *   Imports overlap, so rows are deduplicated on their natural key.
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core'

/**
 * Origin tags of a listen. Only `player` listens are submitted anywhere;
 * the others were backfilled from a remote service.
 */
export type ListenSource = 'player' | 'lastfm' | 'listenbrainz'

export const SELF_SOURCE: ListenSource = 'player'

// ============================================================================
// LISTENS
// ============================================================================

export const listens = sqliteTable('listens', {
  id: integer('id').primaryKey(),

  startedAt: text('started_at').notNull().unique(),
  // Null while the track is still playing
  completedAt: text('completed_at'),

  // Player ids
  queueId: integer('queue_id'),
  trackId: integer('track_id').notNull(),
  albumId: integer('album_id').notNull(),
  albumArtistId: integer('album_artist_id').notNull(),

  trackTitle: text('track_title').notNull(),
  albumTitle: text('album_title').notNull(),
  trackArtist: text('track_artist').notNull(),
  albumArtist: text('album_artist').notNull(),
  durationSeconds: integer('duration_seconds').notNull(),
  trackNumber: integer('track_number'),
  discNumber: integer('disc_number'),

  recordingMbid: text('recording_mbid'),
  releaseMbid: text('release_mbid'),

  source: text('source').$type<ListenSource>().notNull(),

  // Set once, when a service accepted the listen
  scrobbledAt: text('scrobbled_at'),
})

export type ListenRow = typeof listens.$inferSelect
export type NewListenRow = typeof listens.$inferInsert

// ============================================================================
// LASTFM_LISTENS - history import staging
// ============================================================================

export const lastfmListens = sqliteTable(
  'lastfm_listens',
  {
    id: integer('id').primaryKey(),
    secondsSinceEpoch: integer('seconds_since_epoch').notNull(),
    title: text('title').notNull(),
    trackArtist: text('track_artist').notNull(),
    album: text('album').notNull(),
    trackMbid: text('track_mbid'),
    artistMbid: text('artist_mbid'),
    albumMbid: text('album_mbid'),
  },
  (table) => [
    uniqueIndex('ix_lastfm_listens_natural_key').on(
      table.secondsSinceEpoch,
      table.title,
      table.trackArtist,
      table.album,
    ),
    index('ix_lastfm_listens_seconds').on(table.secondsSinceEpoch),
  ],
)

export type StagingRow = typeof lastfmListens.$inferSelect
export type NewStagingRow = typeof lastfmListens.$inferInsert

// ============================================================================
// DDL
// ============================================================================

/**
 * SQL creating the tables above when they do not exist yet.
 * Must match the Drizzle definitions in this module.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS listens
( id               INTEGER PRIMARY KEY
, started_at       TEXT    NOT NULL UNIQUE
, completed_at     TEXT    NULL CHECK (started_at < completed_at)
, queue_id         INTEGER NULL
, track_id         INTEGER NOT NULL
, album_id         INTEGER NOT NULL
, album_artist_id  INTEGER NOT NULL
, track_title      TEXT    NOT NULL
, album_title      TEXT    NOT NULL
, track_artist     TEXT    NOT NULL
, album_artist     TEXT    NOT NULL
, duration_seconds INTEGER NOT NULL
, track_number     INTEGER NULL
, disc_number      INTEGER NULL
, recording_mbid   TEXT    NULL
, release_mbid     TEXT    NULL
, source           TEXT    NOT NULL
, scrobbled_at     TEXT    NULL
);

-- Remote services have second granularity: a listen that was submitted and
-- imported back must not become a second row.
CREATE UNIQUE INDEX IF NOT EXISTS ix_listens_unique_second
ON listens (cast(strftime('%s', started_at) AS INTEGER));

CREATE TABLE IF NOT EXISTS lastfm_listens
( id                 INTEGER PRIMARY KEY
, seconds_since_epoch INTEGER NOT NULL
, title              TEXT    NOT NULL
, track_artist       TEXT    NOT NULL
, album              TEXT    NOT NULL
, track_mbid         TEXT    NULL
, artist_mbid        TEXT    NULL
, album_mbid         TEXT    NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS ix_lastfm_listens_natural_key
ON lastfm_listens (seconds_since_epoch, title, track_artist, album);

CREATE INDEX IF NOT EXISTS ix_lastfm_listens_seconds
ON lastfm_listens (seconds_since_epoch);
`

/**
 * Nullable columns added after the player's original listens schema.
 */
export const ADDED_LISTEN_COLUMNS = ['recording_mbid', 'release_mbid'] as const
