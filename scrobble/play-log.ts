/**
 * Legacy play log import.
 *
 * Reads the JSON-lines play log, pairs its events into listens and writes
 * them to the listens table as self-recorded listens. Listens whose start
 * second is already stored are skipped, so importing the same log twice
 * adds nothing.
 */

import { createReadStream } from 'fs'
import { createInterface } from 'readline'
import { pairPlaybackEvents } from './event-pairer'
import { insertPairedListen } from '../db/listens'
import type { Store } from '../db'
import { ValidationError } from '../cli/utils/errors'
import { createLogger, type Logger } from '../cli/utils/logger'
import { PlaybackEventLineSchema, toPlaybackEvent, type PlaybackEvent } from '../types/playback-event'

export interface PlayLogImportSummary {
  paired: number
  inserted: number
  skipped: number
}

/**
 * Parse one play log line.
 *
 * @throws ValidationError naming the line when it is not a valid event
 */
export function parsePlayLogLine(line: string, lineNumber: number): PlaybackEvent {
  let json: unknown
  try {
    json = JSON.parse(line)
  } catch {
    throw ValidationError.invalidFormat(`play log line ${lineNumber}`, 'a JSON object', line)
  }

  const parsed = PlaybackEventLineSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue ? issue.path.join('.') : 'event'
    throw ValidationError.invalidFormat(`play log line ${lineNumber}, ${field}`, issue ? issue.message : 'a playback event')
  }

  return toPlaybackEvent(parsed.data)
}

/**
 * Events of a play log file, in file order. Blank lines are skipped.
 */
export async function* readPlayLog(path: string): AsyncGenerator<PlaybackEvent, void, undefined> {
  const lines = createInterface({ input: createReadStream(path, { encoding: 'utf8' }), crlfDelay: Infinity })

  let lineNumber = 0
  try {
    for await (const line of lines) {
      lineNumber++
      if (line.trim() === '') continue
      yield parsePlayLogLine(line, lineNumber)
    }
  } finally {
    lines.close()
  }
}

export async function importPlayLog(
  store: Store,
  path: string,
  options: { logger?: Logger } = {},
): Promise<PlayLogImportSummary> {
  const logger = options.logger ?? createLogger('play-log')
  const summary: PlayLogImportSummary = { paired: 0, inserted: 0, skipped: 0 }

  for await (const listen of pairPlaybackEvents(readPlayLog(path))) {
    summary.paired++
    if (insertPairedListen(store, listen)) {
      summary.inserted++
    } else {
      summary.skipped++
    }
  }

  logger.info(`Imported ${summary.inserted} listens from ${path} (${summary.skipped} already present).`)
  return summary
}
