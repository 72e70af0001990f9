/**
 * Import History Command
 *
 * Copies the Last.fm listening history of LAST_FM_USER into the staging
 * table of the database.
 *
 * Usage:
 *   listenrelay import-history listens.sqlite3          # last 30 days, or since the newest staged listen
 *   listenrelay import-history listens.sqlite3 --full   # everything
 */

import { Command } from 'commander'
import { LastfmClient } from '../../scrobble/lastfm-client'
import { importHistory, type ImportMode, type ImportSummary } from '../../scrobble/history-import'
import { warnMissingCredentials } from '../utils/config'
import { createCommandContext, withStore, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'

export interface ImportHistoryCommandOptions {
  full?: boolean
}

export async function importHistoryAction(
  dbPath: string,
  options: ImportHistoryCommandOptions,
  ctx: CommandContext,
): Promise<ImportSummary> {
  const { config, logger } = ctx
  warnMissingCredentials(config, 'lastfm-history', logger)

  const client = new LastfmClient({ config: config.lastfm, fetchFn: ctx.fetchFn, logger })
  const mode: ImportMode = options.full ? 'full' : 'incremental'

  const summary = await withStore(dbPath, logger, (store) =>
    importHistory(store, client, { user: config.lastfm.user, mode, now: ctx.now, sleep: ctx.sleep, logger }),
  )

  if (!summary.converged) {
    logger.warn(`Staged ${summary.local} listens, but Last.fm reports ${summary.total}.`)
  }
  return summary
}

export const importHistoryCommand = new Command('import-history')
  .description('Import listening history from Last.fm')
  .argument('<db>', 'Path to the listens database')
  .option('--full', 'Import the entire history instead of recent listens')
  .action(async (db: string, options: ImportHistoryCommandOptions) => {
    try {
      await importHistoryAction(db, options, createCommandContext('history'))
    } catch (error) {
      handleError(error)
    }
  })

export default importHistoryCommand
