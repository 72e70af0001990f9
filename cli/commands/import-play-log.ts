/**
 * Import Play Log Command
 *
 * Reconstructs listens from a legacy JSON-lines play log and adds them to
 * the database.
 *
 * Usage:
 *   listenrelay import-play-log listens.sqlite3 plays.jsonl
 */

import { Command } from 'commander'
import { importPlayLog, type PlayLogImportSummary } from '../../scrobble/play-log'
import { createCommandContext, withStore, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'

export async function importPlayLogAction(dbPath: string, logPath: string, ctx: CommandContext): Promise<PlayLogImportSummary> {
  return withStore(dbPath, ctx.logger, (store) => importPlayLog(store, logPath, { logger: ctx.logger }))
}

export const importPlayLogCommand = new Command('import-play-log')
  .description('Add listens reconstructed from a play log')
  .argument('<db>', 'Path to the listens database')
  .argument('<log>', 'Path to the play log (JSON lines)')
  .action(async (db: string, log: string) => {
    try {
      await importPlayLogAction(db, log, createCommandContext('play-log'))
    } catch (error) {
      handleError(error)
    }
  })

export default importPlayLogCommand
