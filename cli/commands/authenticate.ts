/**
 * Authenticate Command
 *
 * Obtains a Last.fm session key for this application:
 *
 *   1. `auth.getToken` returns a request token
 *   2. the user authorizes the token in the browser
 *   3. `auth.getSession` exchanges the token for a session key
 *
 * The key is printed, to be set as LAST_FM_SESSION_KEY for later runs.
 *
 * Usage:
 *   listenrelay authenticate
 */

import { Command } from 'commander'
import * as readline from 'readline/promises'
import { LastfmClient } from '../../scrobble/lastfm-client'
import { warnMissingCredentials } from '../utils/config'
import { createCommandContext, type CommandContext } from '../utils/context'
import { handleError } from '../utils/errors'
import type { LastfmSession } from '../../types/lastfm'

// ============================================================================
// Types
// ============================================================================

/** Shows a message and resolves once the user answered */
export type PromptFn = (message: string) => Promise<string>

// ============================================================================
// Helper Functions
// ============================================================================

export async function promptTerminal(message: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    return await rl.question(message)
  } finally {
    rl.close()
  }
}

// ============================================================================
// Action
// ============================================================================

export async function authenticateAction(ctx: CommandContext, prompt: PromptFn = promptTerminal): Promise<LastfmSession> {
  const { config, logger } = ctx
  warnMissingCredentials(config, 'lastfm-auth', logger)

  const client = new LastfmClient({ config: config.lastfm, fetchFn: ctx.fetchFn, logger })
  const token = await client.getToken()

  logger.log('Please authorize the application at the following page:\n')
  logger.log(`${client.authorizationUrl(token)}\n`)
  await prompt('Press Enter to continue.')

  const session = await client.getSession(token)

  logger.log(`\nScrobbling authorized by user ${session.name}.`)
  logger.log('Please set the following environment variable when scrobbling:\n')
  logger.log(`LAST_FM_SESSION_KEY=${session.key}`)

  return session
}

// ============================================================================
// Command Definition
// ============================================================================

export const authenticateCommand = new Command('authenticate')
  .description('Obtain a Last.fm session key')
  .action(async () => {
    try {
      await authenticateAction(createCommandContext('authenticate'))
    } catch (error) {
      handleError(error)
    }
  })

export default authenticateCommand
