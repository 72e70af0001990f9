/**
 * Request Signing Tests
 */

import { describe, it, expect } from 'vitest'
import { createHash } from 'crypto'
import { RequestSigner, percentEncode, encodeParams } from './signer'

const signer = new RequestSigner({ apiKey: 'test-key', secret: 'test-secret' })

function md5(input: string): string {
  return createHash('md5').update(input, 'utf8').digest('hex')
}

describe('RequestSigner', () => {
  it('concatenates sorted key/value pairs followed by the secret', () => {
    expect(signer.signatureInput({ method: 'auth.getToken' })).toBe('api_keytest-keymethodauth.getTokentest-secret')
  })

  it('signs with the MD5 hex digest of the signature input', () => {
    expect(signer.signature({ method: 'auth.getToken' })).toBe(md5('api_keytest-keymethodauth.getTokentest-secret'))
  })

  it('appends api_sig and then format after the sorted parameters', () => {
    const entries = signer.sign({ token: 'abc', method: 'auth.getSession' })

    expect(entries).toEqual([
      ['api_key', 'test-key'],
      ['method', 'auth.getSession'],
      ['token', 'abc'],
      ['api_sig', md5('api_keytest-keymethodauth.getSessiontokenabctest-secret')],
      ['format', 'json'],
    ])
  })

  it('sorts keys by code point', () => {
    const keys = signer.canonicalize({ 'album[0]': 'x', 'albumArtist[0]': 'y', 'artist[0]': 'z' }).map(([key]) => key)
    expect(keys).toEqual(['albumArtist[0]', 'album[0]', 'api_key', 'artist[0]'])
  })

  it('uses the raw, unencoded values in the signature', () => {
    expect(signer.signatureInput({ 'track[0]': 'AC/DC & Friends' })).toBe('api_keytest-keytrack[0]AC/DC & Friendstest-secret')
  })

  it('leaves format out of the signature', () => {
    const entries = signer.sign({ method: 'auth.getToken' })
    expect(entries.find(([key]) => key === 'api_sig')?.[1]).toBe(signer.signature({ method: 'auth.getToken' }))
  })

  it('adds no signature to unsigned calls', () => {
    expect(signer.unsigned({ method: 'user.getRecentTracks', user: 'someone' })).toEqual([
      ['api_key', 'test-key'],
      ['method', 'user.getRecentTracks'],
      ['user', 'someone'],
      ['format', 'json'],
    ])
  })
})

describe('percentEncode', () => {
  it('escapes the slash and encodes space as %20', () => {
    expect(percentEncode('AC/DC & Friends')).toBe('AC%2FDC%20%26%20Friends')
  })

  it('escapes the characters encodeURIComponent keeps', () => {
    expect(percentEncode("Don't (Stop)!*")).toBe('Don%27t%20%28Stop%29%21%2A')
  })

  it('encodes non-ASCII characters as UTF-8', () => {
    expect(percentEncode('Café')).toBe('Caf%C3%A9')
  })

  it('keeps unreserved characters', () => {
    expect(percentEncode('a-Z_0.9~')).toBe('a-Z_0.9~')
  })
})

describe('encodeParams', () => {
  it('joins encoded pairs in the given order', () => {
    expect(encodeParams([['track[0]', 'A B'], ['format', 'json']])).toBe('track%5B0%5D=A%20B&format=json')
  })
})
