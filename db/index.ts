/**
 * @module db
 *
 * Opens the listens store. The relay owns the connection for the whole run;
 * no other reader or writer is expected meanwhile.
 *
 * @example
 * ```ts
 * import { openStore } from './db'
 *
 * const store = openStore('listens.sqlite3')
 * try {
 *   for (const listen of iterEligibleListens(store)) { ... }
 * } finally {
 *   store.close()
 * }
 * ```
 */

import Database from 'better-sqlite3'
import { z } from 'zod'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'
import { ADDED_LISTEN_COLUMNS, SCHEMA_SQL } from './schema'
import { createLogger, type Logger } from '../cli/utils/logger'

export * from './schema'
export * from './listens'
export * from './staging'

export type StoreDatabase = BetterSQLite3Database<typeof schema>

export interface Store {
  /** Path of the SQLite file (':memory:' in tests) */
  path: string
  /** The underlying better-sqlite3 connection */
  sqlite: Database.Database
  /** The Drizzle ORM database instance */
  db: StoreDatabase
  close: () => void
}

export interface OpenStoreOptions {
  logger?: Logger
}

/**
 * Open a store and make sure the tables the relay uses exist.
 */
export function openStore(path: string, options: OpenStoreOptions = {}): Store {
  const logger = options.logger ?? createLogger('db')
  const sqlite = new Database(path)

  try {
    sqlite.pragma('journal_mode = WAL')
    ensureSchema(sqlite)
  } catch (error) {
    sqlite.close()
    throw error
  }

  logger.debug(`Opened store at ${path}`)

  return {
    path,
    sqlite,
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  }
}

const TableInfoSchema = z.array(z.object({ name: z.string() }))

/**
 * Create missing tables, and add the optional identifier columns to a
 * listens table created before they existed.
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL)

  const columns = TableInfoSchema.parse(sqlite.prepare('PRAGMA table_info(listens)').all())
  const present = new Set(columns.map((column) => column.name))
  for (const column of ADDED_LISTEN_COLUMNS) {
    if (!present.has(column)) {
      sqlite.exec(`ALTER TABLE listens ADD COLUMN ${column} TEXT NULL`)
    }
  }
}
