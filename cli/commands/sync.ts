/**
 * Sync Command
 *
 * Scrobbles to Last.fm, then imports the recent Last.fm history, so the
 * staging table reflects what was just submitted.
 *
 * Usage:
 *   listenrelay sync listens.sqlite3
 */

import { Command } from 'commander'
import { scrobbleAction } from './scrobble'
import { importHistoryAction } from './import-history'
import { createCommandContext, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'
import type { ScrobbleSummary } from '../../scrobble/lastfm-submitter'
import type { ImportSummary } from '../../scrobble/history-import'

export interface SyncResult {
  scrobble: ScrobbleSummary
  history: ImportSummary
}

export async function syncAction(dbPath: string, ctx: CommandContext): Promise<SyncResult> {
  const scrobble = await scrobbleAction(dbPath, { ...ctx, logger: ctx.logger.child('lastfm') })
  const history = await importHistoryAction(dbPath, { full: false }, { ...ctx, logger: ctx.logger.child('history') })
  return { scrobble, history }
}

export const syncCommand = new Command('sync')
  .description('Scrobble to Last.fm, then import recent Last.fm history')
  .argument('<db>', 'Path to the listens database')
  .action(async (db: string) => {
    try {
      await syncAction(db, createCommandContext('sync'))
    } catch (error) {
      handleError(error)
    }
  })

export default syncCommand
