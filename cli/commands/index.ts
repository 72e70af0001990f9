/**
 * CLI Command Registry
 *
 * Commander command exports for the program in main.ts, and the actions
 * behind them for programmatic use.
 */

export { authenticateCommand, authenticateAction, promptTerminal, type PromptFn } from './authenticate'
export { scrobbleCommand, scrobbleAction } from './scrobble'
export { submitListensCommand, submitListensAction } from './submit-listens'
export { importHistoryCommand, importHistoryAction, type ImportHistoryCommandOptions } from './import-history'
export { importPlayLogCommand, importPlayLogAction } from './import-play-log'
export { syncCommand, syncAction, type SyncResult } from './sync'
