/**
 * listenrelay CLI Program (Commander-based)
 *
 * Commands:
 *   listenrelay authenticate                 - Obtain a Last.fm session key
 *   listenrelay scrobble <db>                - Submit listens to Last.fm
 *   listenrelay submit-listens <db>          - Submit listens to ListenBrainz
 *   listenrelay import-history <db> [--full] - Import Last.fm history
 *   listenrelay import-play-log <db> <log>   - Add listens from a play log
 *   listenrelay sync <db>                    - scrobble, then import-history
 */

import { Command } from 'commander'
import {
  authenticateCommand,
  scrobbleCommand,
  submitListensCommand,
  importHistoryCommand,
  importPlayLogCommand,
  syncCommand,
} from './commands'

// Package info
const pkg = {
  name: 'listenrelay',
  version: '0.1.0',
  description: 'Submit locally recorded listens to Last.fm and ListenBrainz',
}

export const program = new Command()
  .name(pkg.name)
  .description(pkg.description)
  .version(pkg.version, '-v, --version', 'Show version number')
  .option('--debug', 'Enable debug output')

// Loggers are created inside the actions, after this has run.
program.hook('preAction', (thisCommand) => {
  if (thisCommand.opts().debug) {
    process.env.DEBUG = '1'
  }
})

program.addCommand(authenticateCommand)
program.addCommand(scrobbleCommand)
program.addCommand(submitListensCommand)
program.addCommand(importHistoryCommand)
program.addCommand(importPlayLogCommand)
program.addCommand(syncCommand)
