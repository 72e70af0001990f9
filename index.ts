/**
 * listenrelay
 *
 * Publishes locally recorded listens to Last.fm and ListenBrainz, imports
 * Last.fm history into a staging table, and reconstructs listens from a
 * legacy play log.
 *
 * @example
 * ```typescript
 * import { openStore, LastfmClient, scrobbleToLastfm, loadConfig } from 'listenrelay'
 *
 * const config = loadConfig()
 * const store = openStore('listens.sqlite3')
 * try {
 *   await scrobbleToLastfm(store, new LastfmClient({ config: config.lastfm }))
 * } finally {
 *   store.close()
 * }
 * ```
 */

export * from './db'
export * from './scrobble'
export * from './lib/batching'
export * from './lib/rate-limit'
export * from './lib/reliability'
export * from './lib/text-repair'
export * from './types/listen'
export * from './types/playback-event'
export * from './types/lastfm'
export * from './types/listenbrainz'
export * from './cli/utils/errors'
export { loadConfig, warnMissingCredentials, type RelayConfig, type LastfmConfig, type ListenbrainzConfig, type CredentialService } from './cli/utils/config'
export { Logger, createLogger, type LogLevel, type LoggerOptions } from './cli/utils/logger'
