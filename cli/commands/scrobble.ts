/**
 * Scrobble Command
 *
 * Submits eligible listens from the last 14 days to Last.fm.
 *
 * Usage:
 *   listenrelay scrobble listens.sqlite3
 */

import { Command } from 'commander'
import { LastfmClient } from '../../scrobble/lastfm-client'
import { scrobbleToLastfm, type ScrobbleSummary } from '../../scrobble/lastfm-submitter'
import { warnMissingCredentials } from '../utils/config'
import { createCommandContext, withStore, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'

export async function scrobbleAction(dbPath: string, ctx: CommandContext): Promise<ScrobbleSummary> {
  const { config, logger } = ctx
  warnMissingCredentials(config, 'lastfm', logger)

  const client = new LastfmClient({ config: config.lastfm, fetchFn: ctx.fetchFn, logger })

  return withStore(dbPath, logger, (store) => scrobbleToLastfm(store, client, { now: ctx.now, logger }))
}

export const scrobbleCommand = new Command('scrobble')
  .description('Submit unscrobbled listens to Last.fm')
  .argument('<db>', 'Path to the listens database')
  .action(async (db: string) => {
    try {
      await scrobbleAction(db, createCommandContext('lastfm'))
    } catch (error) {
      handleError(error)
    }
  })

export default scrobbleCommand
