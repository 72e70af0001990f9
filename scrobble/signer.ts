/**
 * Last.fm Request Signing
 *
 * Signature input: every parameter (plus `api_key`), sorted by key, written
 * as `key` immediately followed by `value`, then the shared secret. The
 * signature is the hex MD5 digest of that string. `format` is not part of
 * the signing contract and is appended after signing.
 *
 * @see https://www.last.fm/api/authspec#_8-signing-calls
 */

import { createHash } from 'crypto'

export type RequestParams = Record<string, string>

/** Ordered key/value pairs, in the order they are sent */
export type ParamEntries = Array<[string, string]>

export interface SignerCredentials {
  apiKey: string
  secret: string
}

export class RequestSigner {
  private apiKey: string
  private secret: string

  constructor(credentials: SignerCredentials) {
    this.apiKey = credentials.apiKey
    this.secret = credentials.secret
  }

  /**
   * Parameters merged with the API key, sorted by key
   */
  canonicalize(params: RequestParams): ParamEntries {
    return Object.entries({ ...params, api_key: this.apiKey }).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  signatureInput(params: RequestParams): string {
    return this.canonicalize(params).map(([key, value]) => key + value).join('') + this.secret
  }

  signature(params: RequestParams): string {
    return createHash('md5').update(this.signatureInput(params), 'utf8').digest('hex')
  }

  /**
   * Sorted parameters followed by `api_sig` and `format=json`
   */
  sign(params: RequestParams): ParamEntries {
    const entries = this.canonicalize(params)
    entries.push(['api_sig', this.signature(params)])
    entries.push(['format', 'json'])
    return entries
  }

  /**
   * Parameters for a call that needs no signature (read-only methods)
   */
  unsigned(params: RequestParams): ParamEntries {
    const entries = this.canonicalize(params)
    entries.push(['format', 'json'])
    return entries
  }
}

/**
 * Percent-encode with no character treated as safe: only ASCII letters,
 * digits and `-_.~` stay literal, `/` becomes `%2F`, space becomes `%20`.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => '%' + c.charCodeAt(0).toString(16).toUpperCase(),
  )
}

/**
 * `key=value` pairs joined by `&`, in the given order
 */
export function encodeParams(entries: ParamEntries): string {
  return entries.map(([key, value]) => `${percentEncode(key)}=${percentEncode(value)}`).join('&')
}
