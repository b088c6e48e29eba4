import { describe, expect, it } from 'vitest'

import {
  calculateAttributeDigest,
  calculateBodyDigest,
  calculateDigest,
} from '../../lib/utils/digestUtils.ts'

describe('digestUtils', () => {
  describe('calculateBodyDigest', () => {
    it('returns the hex md5 of the body', () => {
      expect(calculateBodyDigest('hello')).toBe('5d41402abc4b2a76b9719d911017c592')
    })

    it('matches the digest of the raw bytes', () => {
      const body = '\0'.repeat(300_000)

      expect(calculateBodyDigest(body)).toBe('4a21de7a58fb8ecb9a1b1f08a3068269')
      expect(calculateDigest(new Uint8Array(300_000))).toBe('4a21de7a58fb8ecb9a1b1f08a3068269')
    })
  })

  describe('calculateAttributeDigest', () => {
    it('returns empty string without attributes', () => {
      expect(calculateAttributeDigest({})).toBe('')
    })

    it('digests a single string attribute', () => {
      expect(calculateAttributeDigest({ k: { dataType: 'String', stringValue: 'v' } })).toBe(
        '0a77b0642718c3d9dd47090567d11e0d',
      )
    })

    it('sorts attributes by name before digesting', () => {
      const digest = calculateAttributeDigest({
        b: { dataType: 'Number', stringValue: '42' },
        a: { dataType: 'Binary', binaryValue: new Uint8Array([1, 2, 3]) },
      })

      expect(digest).toBe('d7ca17fb83d48502a1e3568e094b88e3')
    })

    it('does not depend on insertion order', () => {
      const first = calculateAttributeDigest({
        a: { dataType: 'String', stringValue: 'x' },
        b: { dataType: 'String', stringValue: 'y' },
      })
      const second = calculateAttributeDigest({
        b: { dataType: 'String', stringValue: 'y' },
        a: { dataType: 'String', stringValue: 'x' },
      })

      expect(first).toBe(second)
    })
  })
})
