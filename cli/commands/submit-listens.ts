/**
 * Submit Listens Command
 *
 * Submits eligible listens to ListenBrainz.
 *
 * Usage:
 *   listenrelay submit-listens listens.sqlite3
 */

import { Command } from 'commander'
import { ListenbrainzClient } from '../../scrobble/listenbrainz-client'
import { submitToListenbrainz, type SubmitSummary } from '../../scrobble/listenbrainz-submitter'
import { RateLimiter } from '../../lib/rate-limit'
import { warnMissingCredentials } from '../utils/config'
import { createCommandContext, withStore, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'

export async function submitListensAction(dbPath: string, ctx: CommandContext): Promise<SubmitSummary> {
  const { config, logger } = ctx
  warnMissingCredentials(config, 'listenbrainz', logger)

  const client = new ListenbrainzClient({ userToken: config.listenbrainz.userToken, fetchFn: ctx.fetchFn, logger })
  const rateLimiter = new RateLimiter({ sleep: ctx.sleep, logger })

  return withStore(dbPath, logger, (store) =>
    submitToListenbrainz(store, client, { clientName: config.clientName, now: ctx.now, rateLimiter, logger }),
  )
}

export const submitListensCommand = new Command('submit-listens')
  .description('Submit unsubmitted listens to ListenBrainz')
  .argument('<db>', 'Path to the listens database')
  .action(async (db: string) => {
    try {
      await submitListensAction(db, createCommandContext('listenbrainz'))
    } catch (error) {
      handleError(error)
    }
  })

export default submitListensCommand
