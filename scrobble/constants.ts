/**
 * Limits and endpoints imposed by the remote services.
 */

// ============================================================================
// Last.fm
// ============================================================================

export const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/'
export const LASTFM_AUTH_URL = 'https://www.last.fm/api/auth/'

/** Entries allowed in one track.scrobble call */
export const LASTFM_MAX_BATCH_SIZE = 50

/** Last.fm ignores scrobbles older than this */
export const LASTFM_MAX_BACKDATE_DAYS = 14

/** Page size of user.getRecentTracks */
export const LASTFM_HISTORY_PAGE_SIZE = 200

// ============================================================================
// ListenBrainz
// ============================================================================

export const LISTENBRAINZ_SUBMIT_URL = 'https://api.listenbrainz.org/1/submit-listens'

/** Largest request body accepted by submit-listens */
export const LISTENBRAINZ_MAX_BODY_BYTES = 10240

/** Typical serialized size of one listen; seeds the first batch size */
export const LISTENBRAINZ_ASSUMED_LISTEN_BYTES = 215

/** Batch size increase after a batch that fit */
export const LISTENBRAINZ_BATCH_GROWTH = 5

// ============================================================================
// History import
// ============================================================================

/** Window an incremental import looks back over */
export const INCREMENTAL_WINDOW_DAYS = 30

export const HISTORY_MAX_CONSECUTIVE_FAILURES = 10

export const HISTORY_RETRY_DELAY_MS = 5000

export const DAY_MS = 24 * 60 * 60 * 1000
