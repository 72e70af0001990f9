/**
 * @module scrobble
 *
 * Submission to Last.fm and ListenBrainz, Last.fm history import, and
 * play log reconstruction.
 */

export * from './constants'
export * from './signer'
export * from './lastfm-client'
export * from './reconcile'
export * from './listenbrainz-client'
export * from './lastfm-submitter'
export * from './listenbrainz-submitter'
export * from './history-import'
export * from './event-pairer'
export * from './play-log'
