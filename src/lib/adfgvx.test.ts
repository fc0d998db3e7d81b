import { describe, expect, it } from 'vitest'
import {
  ADFGVX_PRESETS,
  adfgvx_decrypt,
  adfgvx_encrypt,
  createSizedMatrix,
  decrypt,
  describeCipherError,
  encrypt,
  readColumnMajor,
  readRowMajor,
  truncateToMultipleOf,
} from './adfgvx'
import { POLYBIUS_SQUARE } from './polybius'

const ALPHABET = POLYBIUS_SQUARE.flat().join('')

// Deterministic filler so round-trip cases stay reproducible.
const sampleText = (length: number, seed: number): string =>
  Array.from({ length }, (_, i) => ALPHABET[(seed * 7 + i * 13) % ALPHABET.length]).join('')

describe('ADFGVX cipher', () => {
  it('encrypts the classic example', () => {
    const { plaintext, key } = ADFGVX_PRESETS.classic
    expect(encrypt(plaintext, key)).toEqual({ ok: true, value: 'XGFFGGGGDDDDGVGGGDXFXGXV' })
  })

  it('decrypts the classic example back to the plaintext', () => {
    expect(decrypt('XGFFGGGGDDDDGVGGGDXFXGXV', 'GERMAN')).toEqual({ ok: true, value: 'ATTACKATDAWN' })
  })

  it('sorts digits before letters when ordering columns', () => {
    const { plaintext, key } = ADFGVX_PRESETS.digits
    expect(encrypt(plaintext, key)).toEqual({ ok: true, value: 'FXDFGXFVFFVFFVFAFDGXDFXDFGAA' })
    expect(encrypt('ABCDE', 'KEY12')).toEqual({ ok: true, value: 'XDGFGFDVVX' })
  })

  it('round-trips plaintexts whose length is a multiple of the key length', () => {
    const keys = ['GERMAN', 'Cipher7', 'KEY12', 'aAbBc', '0123456789abcdef']
    keys.forEach((key, seed) => {
      for (const rows of [1, 2, 5]) {
        const plaintext = sampleText(key.length * rows, seed + rows)
        const ciphertext = encrypt(plaintext, key)
        if (!ciphertext.ok) throw new Error(describeCipherError(ciphertext.error))
        expect(decrypt(ciphertext.value, key)).toEqual({ ok: true, value: plaintext })
      }
    })
  })

  it('keeps the key row in the matrices', () => {
    const result = adfgvx_encrypt('ATTACKATDAWN', 'GERMAN')
    if (!result.ok) throw new Error('expected success')
    expect(result.value.symbols).toBe('DGXGXGDGGVGDDGXGFXDGVGFF')
    expect(result.value.matrix[0].join('')).toBe('GERMAN')
    expect(result.value.matrix[1]).toEqual(['D', 'G', 'X', 'G', 'X', 'G'])
    expect(result.value.reorderedMatrix[0].join('')).toBe('AEGMNR')
    expect(result.value.reorderedMatrix[1]).toEqual(['X', 'G', 'D', 'G', 'G', 'X'])
    expect(result.value.truncated).toBe(0)
  })

  it('fills the decrypt matrix under the sorted key', () => {
    const result = adfgvx_decrypt('XGFFGGGGDDDDGVGGGDXFXGXV', 'GERMAN')
    if (!result.ok) throw new Error('expected success')
    expect(result.value.matrix[0].join('')).toBe('AEGMNR')
    expect(result.value.reorderedMatrix[0].join('')).toBe('GERMAN')
    expect(result.value.symbols).toBe('DGXGXGDGGVGDDGXGFXDGVGFF')
    expect(result.value.droppedSymbol).toBe(false)
  })

  it('fails with InvalidSymbol for a character outside the alphabet', () => {
    expect(decrypt('ADFGVZ', 'GERMAN')).toEqual({ ok: false, error: { kind: 'InvalidSymbol', char: 'Z' } })
  })

  it('fails with UnmappableCharacter for uncleaned plaintext', () => {
    expect(encrypt('ATTACK AT', 'GERMAN')).toEqual({
      ok: false,
      error: { kind: 'UnmappableCharacter', char: ' ', index: 6 },
    })
  })

  it('validates the key before touching the text', () => {
    expect(encrypt('attack', 'abc')).toEqual({
      ok: false,
      error: { kind: 'InvalidKey', reason: 'TooShort', key: 'abc' },
    })
    expect(decrypt('ZZZZ', 'GERMANY1GERMANY12')).toEqual({
      ok: false,
      error: { kind: 'InvalidKey', reason: 'TooLong', key: 'GERMANY1GERMANY12' },
    })
  })
})

describe('matrix sizing', () => {
  it('rounds a length down to a multiple', () => {
    expect(truncateToMultipleOf(10, 5)).toBe(10)
    expect(truncateToMultipleOf(10, 7)).toBe(7)
    expect(truncateToMultipleOf(3, 5)).toBe(0)
  })

  it('reserves a row for the key', () => {
    const matrix = createSizedMatrix('ADFGVXADFGVX', 'GERMAN')
    expect(matrix).toHaveLength(3)
    expect(matrix.every((row) => row.length === 6)).toBe(true)
    expect(createSizedMatrix('ADF', 'GERMAN')).toHaveLength(1)
  })

  it('reads columns top to bottom and rows left to right, skipping the key row', () => {
    const matrix = [
      ['K', 'E', 'Y'],
      ['A', 'D', 'F'],
      ['G', 'V', 'X'],
    ]
    expect(readColumnMajor(matrix)).toBe('AGDVFX')
    expect(readRowMajor(matrix)).toBe('ADFGVX')
  })

  // Known lossy behaviour: trailing symbols that do not fill a whole row are discarded.
  it('drops the symbols that do not fill a whole row', () => {
    const { plaintext, key } = ADFGVX_PRESETS.lossy
    const result = adfgvx_encrypt(plaintext, key)
    if (!result.ok) throw new Error('expected success')
    const substituted = result.value.symbols.length
    expect(substituted).toBe(10)
    expect(result.value.truncated).toBe(3)
    expect(result.value.output).toBe('FAFDAFD')
    expect(result.value.output).toHaveLength(((substituted - (substituted % key.length)) / key.length) * key.length)
  })

  it('decodes only whole pairs from a truncated ciphertext', () => {
    const result = adfgvx_decrypt('FAFDAFD', 'KEYS123')
    if (!result.ok) throw new Error('expected success')
    expect(result.value.symbols).toBe('ADDFFAF')
    expect(result.value.output).toBe('HEL')
    expect(result.value.droppedSymbol).toBe(true)
  })

  it('cuts the ciphertext length down to a multiple of the key length', () => {
    const result = adfgvx_encrypt('ABC', 'KEY12')
    if (!result.ok) throw new Error('expected success')
    expect(result.value.truncated).toBe(1)
    expect(result.value.output).toHaveLength(5)
  })
})

describe('error messages', () => {
  it('describes each failure', () => {
    expect(describeCipherError({ kind: 'InvalidKey', reason: 'HasDuplicates', key: 'abcab' })).toBe(
      'The key "abcab" contains duplicate characters.',
    )
    expect(describeCipherError({ kind: 'UnmappableCharacter', char: '!', index: 0 })).toBe(
      'Character "!" at position 1 is not in the Polybius square.',
    )
    expect(describeCipherError({ kind: 'InvalidSymbol', char: 'Z' })).toBe(
      'Symbol "Z" is not part of the ADFGVX alphabet.',
    )
  })
})
