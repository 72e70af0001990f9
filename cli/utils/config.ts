/**
 * Config Utility
 *
 * Builds the relay configuration from environment variables once, at
 * startup. Components receive the resulting value explicitly; nothing below
 * the CLI reads `process.env` for credentials.
 *
 * Environment:
 *   LAST_FM_API_KEY          Last.fm API key
 *   LAST_FM_SECRET           Shared secret for request signatures
 *   LAST_FM_SESSION_KEY      Printed by `listenrelay authenticate`
 *   LAST_FM_USER             User whose history `import-history` reads
 *   LISTENBRAINZ_USER_TOKEN  ListenBrainz user token
 *   LISTENRELAY_CLIENT_NAME  Reported as `listening_from` (default: listenrelay)
 */

import { z } from 'zod'
import { ConfigError } from './errors'
import type { Logger } from './logger'

export type { Logger } from './logger'

// ============================================================================
// Types
// ============================================================================

export interface LastfmConfig {
  apiKey: string
  secret: string
  sessionKey: string
  user: string
}

export interface ListenbrainzConfig {
  userToken: string
}

export interface RelayConfig {
  lastfm: LastfmConfig
  listenbrainz: ListenbrainzConfig
  clientName: string
}

export type CredentialService = 'lastfm' | 'lastfm-auth' | 'lastfm-history' | 'listenbrainz'

// ============================================================================
// Environment Schema
// ============================================================================

const EnvSchema = z.object({
  LAST_FM_API_KEY: z.string().default(''),
  LAST_FM_SECRET: z.string().default(''),
  LAST_FM_SESSION_KEY: z.string().default(''),
  LAST_FM_USER: z.string().default(''),
  LISTENBRAINZ_USER_TOKEN: z.string().default(''),
  LISTENRELAY_CLIENT_NAME: z.string().min(1).default('listenrelay'),
})

/**
 * Load the configuration from an environment map.
 *
 * Missing credentials are not an error here; see `warnMissingCredentials`.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = issue ? issue.path.join('.') : 'environment'
    throw ConfigError.invalidValue(key, 'a non-empty string')
  }

  const vars = parsed.data
  return {
    lastfm: {
      apiKey: vars.LAST_FM_API_KEY,
      secret: vars.LAST_FM_SECRET,
      sessionKey: vars.LAST_FM_SESSION_KEY,
      user: vars.LAST_FM_USER,
    },
    listenbrainz: {
      userToken: vars.LISTENBRAINZ_USER_TOKEN,
    },
    clientName: vars.LISTENRELAY_CLIENT_NAME,
  }
}

const requiredCredentials: Record<CredentialService, Array<[string, (config: RelayConfig) => string]>> = {
  'lastfm': [
    ['LAST_FM_API_KEY', (c) => c.lastfm.apiKey],
    ['LAST_FM_SECRET', (c) => c.lastfm.secret],
    ['LAST_FM_SESSION_KEY', (c) => c.lastfm.sessionKey],
  ],
  'lastfm-auth': [
    ['LAST_FM_API_KEY', (c) => c.lastfm.apiKey],
    ['LAST_FM_SECRET', (c) => c.lastfm.secret],
  ],
  'lastfm-history': [
    ['LAST_FM_API_KEY', (c) => c.lastfm.apiKey],
    ['LAST_FM_USER', (c) => c.lastfm.user],
  ],
  'listenbrainz': [
    ['LISTENBRAINZ_USER_TOKEN', (c) => c.listenbrainz.userToken],
  ],
}

/**
 * Warn about every empty credential a service needs. Never throws: the
 * run proceeds and the service's own response decides what happens.
 *
 * @returns names of the missing variables
 */
export function warnMissingCredentials(config: RelayConfig, service: CredentialService, logger: Logger): string[] {
  const missing: string[] = []
  for (const [name, read] of requiredCredentials[service]) {
    if (read(config) === '') {
      missing.push(name)
      logger.warn(`${name} is not set, authentication will fail.`)
    }
  }
  return missing
}
