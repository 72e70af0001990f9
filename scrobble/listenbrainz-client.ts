/**
 * ListenBrainz submission client.
 *
 * A batch is all-or-nothing: HTTP 200 means every listen in the body was
 * accepted, any other status rejects the whole batch.
 *
 * @see https://listenbrainz.readthedocs.io/en/latest/users/api/core.html#post--1-submit-listens
 */

import { LISTENBRAINZ_SUBMIT_URL } from './constants'
import type { FetchFn } from './lastfm-client'
import { NetworkError, SubmissionError } from '../cli/utils/errors'
import { createLogger, type Logger } from '../cli/utils/logger'
import { toUnixSeconds, type Listen } from '../types/listen'
import type { AdditionalInfo, ListenPayload, SubmitListensBody } from '../types/listenbrainz'
import type { HeaderSource } from '../lib/rate-limit'

export interface ListenbrainzClientOptions {
  userToken: string
  fetchFn?: FetchFn
  logger?: Logger
  submitUrl?: string
}

// ============================================================================
// Request Formatting
// ============================================================================

export function formatListenbrainzListen(listen: Listen, clientName: string): ListenPayload {
  const additionalInfo: AdditionalInfo = { listening_from: clientName }
  if (listen.trackNumber !== null) {
    additionalInfo.tracknumber = listen.trackNumber
  }
  if (listen.recordingMbid) {
    additionalInfo.recording_mbid = listen.recordingMbid
  }
  if (listen.releaseMbid) {
    additionalInfo.release_mbid = listen.releaseMbid
  }

  return {
    listened_at: toUnixSeconds(listen.startedAt),
    track_metadata: {
      additional_info: additionalInfo,
      artist_name: listen.trackArtist,
      track_name: listen.trackTitle,
      release_name: listen.albumTitle,
    },
  }
}

/**
 * Serialize a batch as a `submit-listens` import body
 */
export function encodeSubmitBody(listens: readonly Listen[], clientName: string): string {
  const body: SubmitListensBody = {
    listen_type: 'import',
    payload: listens.map((listen) => formatListenbrainzListen(listen, clientName)),
  }
  return JSON.stringify(body)
}

/**
 * Re-indent a JSON body for the error report; other bodies stay as they are.
 */
export function prettyBody(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body)
    return JSON.stringify(parsed, null, 2)
  } catch {
    return body
  }
}

// ============================================================================
// Client
// ============================================================================

export class ListenbrainzClient {
  private userToken: string
  private fetchFn: FetchFn
  private logger: Logger
  private submitUrl: string

  constructor(options: ListenbrainzClientOptions) {
    this.userToken = options.userToken
    this.fetchFn = options.fetchFn ?? fetch
    this.logger = options.logger ?? createLogger('listenbrainz')
    this.submitUrl = options.submitUrl ?? LISTENBRAINZ_SUBMIT_URL
  }

  /**
   * POST an encoded body.
   *
   * @returns the response headers, for the rate limiter
   * @throws SubmissionError for any status other than 200
   * @throws NetworkError when the service cannot be reached
   */
  async submit(body: string): Promise<HeaderSource> {
    this.logger.debug(`POST ${this.submitUrl}`, { bytes: Buffer.byteLength(body, 'utf8') })

    let response: Response
    try {
      response = await this.fetchFn(this.submitUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Token ${this.userToken}`,
          'Content-Type': 'application/json; charset=utf-8',
        },
        body,
      })
    } catch (err) {
      throw NetworkError.connectionFailed(this.submitUrl, err instanceof Error ? err : undefined)
    }

    if (response.status !== 200) {
      throw new SubmissionError(response.status, prettyBody(await response.text()))
    }

    return response.headers
  }
}
