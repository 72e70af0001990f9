/**
 * Scrobble Reconciliation Tests
 */

import { describe, it, expect } from 'vitest'
import { reconcileScrobbles, isAccepted } from './reconcile'
import { decodeScrobbleResponse } from './lastfm-client'
import { ErrorCode, InvariantError } from '../cli/utils/errors'
import { makeListen, scrobbleResponseBody } from './test-utils'

function decoded(codes: string[], accepted?: number) {
  const body = scrobbleResponseBody(codes, accepted)
  const raw = JSON.stringify(body)
  return { result: decodeScrobbleResponse(body, raw), raw }
}

describe('reconcileScrobbles', () => {
  const batch = [makeListen(1), makeListen(2), makeListen(3)]

  it('accepts every listen whose item has code 0', () => {
    const { result, raw } = decoded(['0', '0', '0'])
    expect(reconcileScrobbles(batch, result, raw)).toEqual({ acceptedIds: [1, 2, 3], rejected: [] })
  })

  it('reports rejected listens with their response item', () => {
    const { result, raw } = decoded(['0', '1', '0'])

    const { acceptedIds, rejected } = reconcileScrobbles(batch, result, raw)

    expect(acceptedIds).toEqual([1, 3])
    expect(rejected).toHaveLength(1)
    expect(rejected[0]?.listen.id).toBe(2)
    expect(rejected[0]?.item.ignoredMessage).toEqual({ code: '1', '#text': 'Artist ignored' })
  })

  it('handles a batch of one answered with a bare object', () => {
    const { result, raw } = decoded(['0'])
    expect(reconcileScrobbles([makeListen(7)], result, raw).acceptedIds).toEqual([7])
  })

  it('throws when the accepted counter disagrees with the items', () => {
    const { result, raw } = decoded(['0', '1', '0'], 3)

    try {
      reconcileScrobbles(batch, result, raw)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvariantError)
      if (error instanceof InvariantError) {
        expect(error.code).toBe(ErrorCode.ACCEPTED_COUNT_MISMATCH)
        expect(error.details).toEqual({ expected: 3, actual: 2, response: raw })
      }
    }
  })

  it('throws when the response has a different number of items than the batch', () => {
    const { result, raw } = decoded(['0', '0'])

    expect(() => reconcileScrobbles(batch, result, raw)).toThrow(InvariantError)
  })
})

describe('isAccepted', () => {
  it('only treats the string code 0 as accepted', () => {
    expect(isAccepted({ ignoredMessage: { code: '0' } })).toBe(true)
    expect(isAccepted({ ignoredMessage: { code: '1' } })).toBe(false)
    expect(isAccepted({ ignoredMessage: { code: '2' } })).toBe(false)
  })
})
