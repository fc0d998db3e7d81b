import { describe, expect, it } from 'vitest'
import {
  applyPermutation,
  buildKeySchedule,
  invertPermutation,
  randomKey,
  sortLexicographically,
  sortedColumnOrigins,
  validateKey,
} from './keySchedule'

const reasonOf = (key: string) => {
  const result = validateKey(key)
  return result.ok ? null : result.error.reason
}

describe('key validation', () => {
  it('enforces the length bounds', () => {
    expect(reasonOf('abcd')).toBe('TooShort')
    expect(reasonOf('abcde')).toBeNull()
    expect(reasonOf('abcdefghijklmnop')).toBeNull()
    expect(reasonOf('abcdefghijklmnopq')).toBe('TooLong')
  })

  it('only accepts letters and digits', () => {
    expect(reasonOf('ab-cd')).toBe('NotAlphanumeric')
    expect(reasonOf('abc d')).toBe('NotAlphanumeric')
  })

  it('treats case as significant when looking for duplicates', () => {
    expect(reasonOf('aAbBc')).toBeNull()
    expect(reasonOf('abcAb')).toBe('HasDuplicates')
  })

  it('stops at the first failing check', () => {
    expect(reasonOf('aaa')).toBe('TooShort')
    expect(reasonOf('aaaaaaaaaaaaaaaaa')).toBe('TooLong')
    expect(reasonOf('aa-aa')).toBe('NotAlphanumeric')
  })

  it('carries the rejected key in the error', () => {
    expect(validateKey('ab-cd')).toEqual({
      ok: false,
      error: { kind: 'InvalidKey', reason: 'NotAlphanumeric', key: 'ab-cd' },
    })
  })
})

describe('key schedule', () => {
  it('sorts digits, then uppercase, then lowercase', () => {
    expect(sortLexicographically('GERMAN')).toBe('AEGMNR')
    expect(sortLexicographically('Cipher7')).toBe('7Cehipr')
  })

  it('maps each sorted position to its original column', () => {
    expect(sortedColumnOrigins('GERMAN', 'AEGMNR')).toEqual([4, 1, 0, 3, 5, 2])
  })

  it('claims repeated characters left to right', () => {
    expect(sortedColumnOrigins('BABA', 'AABB')).toEqual([1, 3, 0, 2])
  })

  it('inverts a permutation', () => {
    expect(invertPermutation([4, 1, 0, 3, 5, 2])).toEqual([2, 1, 5, 3, 0, 4])
  })

  it('restores the original order after applying both permutations', () => {
    for (const key of ['GERMAN', 'Cipher7', 'KEYS123', 'zyxwvutsrqponmlk']) {
      const schedule = buildKeySchedule(key)
      if (!schedule.ok) throw new Error(`${key} should be valid`)
      const { sortedIndices, originalIndices } = schedule.value
      const columns = key.split('')
      const sorted = applyPermutation(columns, sortedIndices)
      expect(sorted.join('')).toBe(schedule.value.sortedKey)
      expect(applyPermutation(sorted, originalIndices)).toEqual(columns)
    }
  })

  it('builds the full schedule for a valid key', () => {
    expect(buildKeySchedule('KEY12')).toEqual({
      ok: true,
      value: {
        originalKey: 'KEY12',
        sortedKey: '12EKY',
        sortedIndices: [3, 4, 1, 0, 2],
        originalIndices: [3, 2, 4, 0, 1],
      },
    })
  })

  it('refuses to schedule an invalid key', () => {
    const schedule = buildKeySchedule('abc')
    expect(schedule.ok).toBe(false)
  })
})

describe('random keys', () => {
  it('always produces a valid key within the length bounds', () => {
    for (const length of [1, 5, 8, 16, 40]) {
      const key = randomKey(length)
      expect(validateKey(key).ok).toBe(true)
    }
    expect(randomKey(1)).toHaveLength(5)
    expect(randomKey(40)).toHaveLength(16)
  })

  it('draws from the pool using the supplied source', () => {
    expect(randomKey(5, () => 0)).toBe('01234')
  })
})
