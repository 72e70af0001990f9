/**
 * Last.fm API Client
 *
 * Thin client over the four methods the relay uses:
 * - `track.scrobble` (signed POST, up to 50 entries)
 * - `auth.getToken` / `auth.getSession` (signed GET, authentication flow)
 * - `user.getRecentTracks` (unsigned GET, history import)
 *
 * Every response goes through an explicit decode step that validates it and
 * normalizes single-object elements to lists before anything reads it.
 */

import { RequestSigner, encodeParams, type ParamEntries, type RequestParams } from './signer'
import { LASTFM_API_URL, LASTFM_AUTH_URL, LASTFM_HISTORY_PAGE_SIZE } from './constants'
import { InvariantError, NetworkError } from '../cli/utils/errors'
import { createLogger, type Logger } from '../cli/utils/logger'
import type { LastfmConfig } from '../cli/utils/config'
import { toUnixSeconds, type Listen } from '../types/listen'
import {
  asList,
  LastfmErrorSchema,
  RecentTracksResponseSchema,
  ScrobbleResponseSchema,
  SessionResponseSchema,
  TokenResponseSchema,
  type LastfmSession,
  type RecentTracksPage,
  type ScrobbleBatchResult,
} from '../types/lastfm'
import type { z } from 'zod'

// ============================================================================
// Types
// ============================================================================

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

export interface LastfmClientOptions {
  config: LastfmConfig
  fetchFn?: FetchFn
  logger?: Logger
  apiUrl?: string
}

/**
 * Decoded scrobble result plus the raw body, kept for diagnostics
 */
export interface ScrobbleResponse {
  result: ScrobbleBatchResult
  body: string
}

export interface RecentTracksQuery {
  user: string
  page: number
  /** Inclusive lower bound, seconds since the epoch */
  from?: number | null
  limit?: number
}

interface RawResponse {
  json: unknown
  body: string
}

// ============================================================================
// Request Formatting
// ============================================================================

/**
 * Indexed `track.scrobble` parameters for one entry of a batch
 */
export function formatLastfmScrobble(listen: Listen, index: number): RequestParams {
  const params: RequestParams = {
    [`artist[${index}]`]: listen.trackArtist,
    [`track[${index}]`]: listen.trackTitle,
    [`timestamp[${index}]`]: String(toUnixSeconds(listen.startedAt)),
    [`album[${index}]`]: listen.albumTitle,
    [`duration[${index}]`]: String(listen.durationSeconds),
    [`albumArtist[${index}]`]: listen.albumArtist,
  }
  if (listen.trackNumber !== null) {
    params[`trackNumber[${index}]`] = String(listen.trackNumber)
  }
  if (listen.recordingMbid) {
    params[`mbid[${index}]`] = listen.recordingMbid
  }
  return params
}

export function formatScrobbleParams(batch: readonly Listen[], sessionKey: string): RequestParams {
  const params: RequestParams = { method: 'track.scrobble', sk: sessionKey }
  batch.forEach((listen, index) => Object.assign(params, formatLastfmScrobble(listen, index)))
  return params
}

// ============================================================================
// Response Decoding
// ============================================================================

function issueSummary(error: z.ZodError): string {
  const issue = error.issues[0]
  return issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : error.message
}

/**
 * Validate a `track.scrobble` response and normalize its items to a list.
 *
 * @throws InvariantError when the body does not have the expected shape
 */
export function decodeScrobbleResponse(json: unknown, body: string): ScrobbleBatchResult {
  const parsed = ScrobbleResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw InvariantError.malformedResponse(issueSummary(parsed.error), body, parsed.error)
  }
  const { scrobble, '@attr': attr } = parsed.data.scrobbles
  return {
    accepted: attr.accepted,
    ignored: attr.ignored,
    items: asList(scrobble),
  }
}

/**
 * Validate a `user.getRecentTracks` response and normalize its tracks to a list.
 *
 * @throws InvariantError when the body does not have the expected shape
 */
export function decodeRecentTracks(json: unknown, body: string): RecentTracksPage {
  const parsed = RecentTracksResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw InvariantError.malformedResponse(issueSummary(parsed.error), body, parsed.error)
  }
  const { track, '@attr': attr } = parsed.data.recenttracks
  return {
    page: attr.page,
    totalPages: attr.totalPages,
    total: attr.total,
    tracks: asList(track),
  }
}

// ============================================================================
// Client
// ============================================================================

export class LastfmClient {
  private config: LastfmConfig
  private signer: RequestSigner
  private fetchFn: FetchFn
  private logger: Logger
  private apiUrl: string

  constructor(options: LastfmClientOptions) {
    this.config = options.config
    this.signer = new RequestSigner({ apiKey: options.config.apiKey, secret: options.config.secret })
    this.fetchFn = options.fetchFn ?? fetch
    this.logger = options.logger ?? createLogger('lastfm')
    this.apiUrl = options.apiUrl ?? LASTFM_API_URL
  }

  /**
   * Submit one batch of at most 50 listens.
   *
   * @throws NetworkError on transport, HTTP or API errors
   * @throws InvariantError when the response cannot be decoded
   */
  async scrobble(batch: readonly Listen[]): Promise<ScrobbleResponse> {
    const entries = this.signer.sign(formatScrobbleParams(batch, this.config.sessionKey))
    const raw = await this.request('POST', entries)
    return { result: decodeScrobbleResponse(raw.json, raw.body), body: raw.body }
  }

  async getToken(): Promise<string> {
    const raw = await this.request('GET', this.signer.sign({ method: 'auth.getToken' }))
    const parsed = TokenResponseSchema.safeParse(raw.json)
    if (!parsed.success) {
      throw InvariantError.malformedResponse(issueSummary(parsed.error), raw.body, parsed.error)
    }
    return parsed.data.token
  }

  async getSession(token: string): Promise<LastfmSession> {
    const raw = await this.request('GET', this.signer.sign({ method: 'auth.getSession', token }))
    const parsed = SessionResponseSchema.safeParse(raw.json)
    if (!parsed.success) {
      throw InvariantError.malformedResponse(issueSummary(parsed.error), raw.body, parsed.error)
    }
    return parsed.data.session
  }

  /**
   * Page the user must visit to grant this application access
   */
  authorizationUrl(token: string): string {
    return `${LASTFM_AUTH_URL}?${encodeParams([['api_key', this.config.apiKey], ['token', token]])}`
  }

  async getRecentTracks(query: RecentTracksQuery): Promise<RecentTracksPage> {
    const params: RequestParams = {
      method: 'user.getRecentTracks',
      user: query.user,
      limit: String(query.limit ?? LASTFM_HISTORY_PAGE_SIZE),
      page: String(query.page),
    }
    if (query.from !== undefined && query.from !== null) {
      params.from = String(query.from)
    }
    const raw = await this.request('GET', this.signer.unsigned(params))
    return decodeRecentTracks(raw.json, raw.body)
  }

  private async request(method: 'GET' | 'POST', entries: ParamEntries): Promise<RawResponse> {
    const encoded = encodeParams(entries)
    const url = method === 'GET' ? `${this.apiUrl}?${encoded}` : this.apiUrl
    const init: RequestInit =
      method === 'GET'
        ? { method }
        : {
            method,
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: encoded,
          }

    this.logger.debug(`${method} ${this.apiUrl}`, { method: entries.find(([key]) => key === 'method')?.[1] })

    // The body is read inside the same try: a connection can drop mid-body.
    let response: Response
    let body: string
    try {
      response = await this.fetchFn(url, init)
      body = await response.text()
    } catch (err) {
      throw NetworkError.connectionFailed(this.apiUrl, err instanceof Error ? err : undefined)
    }

    let json: unknown
    try {
      json = JSON.parse(body)
    } catch (err) {
      if (!response.ok) {
        throw NetworkError.httpError(response.status, this.apiUrl, body)
      }
      throw InvariantError.malformedResponse('body is not JSON', body, err instanceof Error ? err : undefined)
    }

    const apiError = LastfmErrorSchema.safeParse(json)
    if (apiError.success) {
      throw NetworkError.apiError(apiError.data.error, apiError.data.message, this.apiUrl)
    }
    if (!response.ok) {
      throw NetworkError.httpError(response.status, this.apiUrl, body)
    }

    return { json, body }
  }
}
