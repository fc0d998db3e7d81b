import { err, ok, type Result } from './result'

export const MIN_KEY_LENGTH = 5
export const MAX_KEY_LENGTH = 16

export type InvalidKeyReason = 'TooShort' | 'TooLong' | 'NotAlphanumeric' | 'HasDuplicates'

export interface InvalidKey {
  kind: 'InvalidKey'
  reason: InvalidKeyReason
  key: string
}

export interface KeySchedule {
  originalKey: string
  sortedKey: string
  /** `sortedIndices[i]` is the original column whose key character sits at sorted position `i`. */
  sortedIndices: number[]
  /** Inverse of `sortedIndices`, used to put reordered columns back. */
  originalIndices: number[]
}

const ALPHANUMERIC = /^[a-zA-Z0-9]+$/

const hasDuplicateCharacters = (key: string): boolean => {
  for (let i = 0; i < key.length; i += 1) {
    for (let j = i + 1; j < key.length; j += 1) {
      if (key[i] === key[j]) return true
    }
  }
  return false
}

const invalid = (key: string, reason: InvalidKeyReason) => err<InvalidKey>({ kind: 'InvalidKey', reason, key })

// Checks run in a fixed order and stop at the first failure.
export const validateKey = (key: string): Result<string, InvalidKey> => {
  if (key.length < MIN_KEY_LENGTH) return invalid(key, 'TooShort')
  if (key.length > MAX_KEY_LENGTH) return invalid(key, 'TooLong')
  if (!ALPHANUMERIC.test(key)) return invalid(key, 'NotAlphanumeric')
  if (hasDuplicateCharacters(key)) return invalid(key, 'HasDuplicates')
  return ok(key)
}

const compareCodePoints = (a: string, b: string): number => {
  const left = a.codePointAt(0) ?? 0
  const right = b.codePointAt(0) ?? 0
  return left - right
}

/** Digits, then uppercase, then lowercase. `Array.prototype.sort` is stable. */
export const sortLexicographically = (key: string): string =>
  key.split('').sort(compareCodePoints).join('')

export const sortedColumnOrigins = (originalKey: string, sortedKey: string): number[] => {
  const claimed = new Array<boolean>(originalKey.length).fill(false)
  const sortedIndices = new Array<number>(sortedKey.length).fill(0)

  for (let i = 0; i < sortedKey.length; i += 1) {
    for (let j = 0; j < originalKey.length; j += 1) {
      if (!claimed[j] && originalKey[j] === sortedKey[i]) {
        sortedIndices[i] = j
        claimed[j] = true
        break
      }
    }
  }
  return sortedIndices
}

export const invertPermutation = (indices: readonly number[]): number[] => {
  const inverse = new Array<number>(indices.length).fill(0)
  indices.forEach((target, position) => {
    inverse[target] = position
  })
  return inverse
}

/** `out[i] = sequence[indices[i]]` */
export const applyPermutation = <T>(sequence: readonly T[], indices: readonly number[]): T[] =>
  indices.map((index) => sequence[index])

export const buildKeySchedule = (key: string): Result<KeySchedule, InvalidKey> => {
  const validated = validateKey(key)
  if (!validated.ok) return validated

  const sortedKey = sortLexicographically(key)
  const sortedIndices = sortedColumnOrigins(key, sortedKey)
  return ok({
    originalKey: key,
    sortedKey,
    sortedIndices,
    originalIndices: invertPermutation(sortedIndices),
  })
}

const KEY_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'

/** Draws `length` distinct alphanumerics. Not suitable for anything beyond classroom use. */
export const randomKey = (length = 8, random: () => number = Math.random): string => {
  const pool = KEY_ALPHABET.split('')
  const size = Math.min(Math.max(length, MIN_KEY_LENGTH), MAX_KEY_LENGTH)
  let key = ''
  for (let i = 0; i < size; i += 1) {
    const [picked] = pool.splice(Math.floor(random() * pool.length), 1)
    key += picked
  }
  return key
}
