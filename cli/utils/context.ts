/**
 * Command Context
 *
 * Everything a command action needs from the outside world, built once when
 * the command runs. Tests pass their own values for any of them.
 */

import { loadConfig, type RelayConfig } from './config'
import { createLogger, type Logger } from './logger'
import { openStore, type Store } from '../../db'
import type { FetchFn } from '../../scrobble/lastfm-client'
import type { SleepFn } from '../../lib/reliability'

export interface CommandContext {
  config: RelayConfig
  logger: Logger
  fetchFn?: FetchFn
  /** Reference time of the run (default: when the action starts) */
  now?: Date
  sleep?: SleepFn
}

export function createCommandContext(name: string, overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    ...overrides,
    config: overrides.config ?? loadConfig(),
    logger: overrides.logger ?? createLogger(name),
  }
}

/**
 * Run `fn` against the store at `path`, closing it afterwards
 */
export async function withStore<T>(path: string, logger: Logger, fn: (store: Store) => Promise<T>): Promise<T> {
  const store = openStore(path, { logger: logger.child('db') })
  try {
    return await fn(store)
  } finally {
    store.close()
  }
}
