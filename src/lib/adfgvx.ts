import { nanoid } from 'nanoid'
import { buildKeySchedule, applyPermutation, type InvalidKey, type KeySchedule } from './keySchedule'
import { decodeSymbolPair, encodeChar, type InvalidSymbol, type UnmappableCharacter } from './polybius'
import { ok, type Result } from './result'

export type Matrix = string[][]

export type CipherMode = 'encrypt' | 'decrypt'

export type CipherError = InvalidKey | UnmappableCharacter | InvalidSymbol

export interface ADFGVXResult {
  id: string
  mode: CipherMode
  input: string
  output: string
  schedule: KeySchedule
  /** Substituted text: the full symbol string on encrypt, the row-major readout on decrypt. */
  symbols: string
  /** Trailing input characters cut off so the content fills whole rows. */
  truncated: number
  /** Decrypt only: the readout had an odd length and its last symbol was ignored. */
  droppedSymbol: boolean
  matrix: Matrix
  reorderedMatrix: Matrix
}

/**
 * Largest multiple of `divisor` that fits in `length`.
 *
 * The matrix only holds whole rows, so every encrypt and decrypt silently drops
 * `length % keyLength` trailing symbols. Kept for compatibility with existing
 * ciphertexts; `ADFGVXResult.truncated` reports how many were lost.
 */
export const truncateToMultipleOf = (length: number, divisor: number): number =>
  length - (length % divisor)

// Row 0 is reserved for the key.
export const createSizedMatrix = (content: string, key: string): Matrix => {
  const columns = key.length
  const rows = Math.ceil(truncateToMultipleOf(content.length, columns) / columns) + 1
  return Array.from({ length: rows }, () => new Array<string>(columns).fill(''))
}

const withHeader = (content: string, header: string): Matrix => {
  const matrix = createSizedMatrix(content, header)
  matrix[0] = header.split('')
  return matrix
}

export const fillRowMajor = (content: string, header: string): Matrix => {
  const matrix = withHeader(content, header)
  let index = 0
  for (let row = 1; row < matrix.length; row += 1) {
    for (let column = 0; column < header.length; column += 1) {
      matrix[row][column] = content[index]
      index += 1
    }
  }
  return matrix
}

export const fillColumnMajor = (content: string, header: string): Matrix => {
  const matrix = withHeader(content, header)
  let index = 0
  for (let column = 0; column < header.length; column += 1) {
    for (let row = 1; row < matrix.length; row += 1) {
      matrix[row][column] = content[index]
      index += 1
    }
  }
  return matrix
}

/** Destination column `c` takes source column `indices[c]`, key row included. */
export const reorderMatrixColumns = (matrix: Matrix, indices: readonly number[]): Matrix =>
  matrix.map((row) => applyPermutation(row, indices))

export const readColumnMajor = (matrix: Matrix): string => {
  let out = ''
  const columns = matrix[0]?.length ?? 0
  for (let column = 0; column < columns; column += 1) {
    for (let row = 1; row < matrix.length; row += 1) {
      out += matrix[row][column]
    }
  }
  return out
}

export const readRowMajor = (matrix: Matrix): string =>
  matrix
    .slice(1)
    .map((row) => row.join(''))
    .join('')

export const substitute = (plaintext: string): Result<string, UnmappableCharacter> => {
  let symbols = ''
  for (let index = 0; index < plaintext.length; index += 1) {
    const pair = encodeChar(plaintext[index], index)
    if (!pair.ok) return pair
    symbols += pair.value[0] + pair.value[1]
  }
  return ok(symbols)
}

export const desubstitute = (
  symbols: string,
): Result<{ text: string; droppedSymbol: boolean }, InvalidSymbol> => {
  let text = ''
  for (let i = 0; i + 1 < symbols.length; i += 2) {
    const char = decodeSymbolPair(symbols[i], symbols[i + 1])
    if (!char.ok) return char
    text += char.value
  }
  return ok({ text, droppedSymbol: symbols.length % 2 === 1 })
}

export const adfgvx_encrypt = (plaintext: string, key: string): Result<ADFGVXResult, CipherError> => {
  const schedule = buildKeySchedule(key)
  if (!schedule.ok) return schedule
  const symbols = substitute(plaintext)
  if (!symbols.ok) return symbols

  const matrix = fillRowMajor(symbols.value, schedule.value.originalKey)
  const reorderedMatrix = reorderMatrixColumns(matrix, schedule.value.sortedIndices)
  return ok<ADFGVXResult>({
    id: nanoid(),
    mode: 'encrypt',
    input: plaintext,
    output: readColumnMajor(reorderedMatrix),
    schedule: schedule.value,
    symbols: symbols.value,
    truncated: symbols.value.length % key.length,
    droppedSymbol: false,
    matrix,
    reorderedMatrix,
  })
}

export const adfgvx_decrypt = (ciphertext: string, key: string): Result<ADFGVXResult, CipherError> => {
  const schedule = buildKeySchedule(key)
  if (!schedule.ok) return schedule

  const matrix = fillColumnMajor(ciphertext, schedule.value.sortedKey)
  const reorderedMatrix = reorderMatrixColumns(matrix, schedule.value.originalIndices)
  const symbols = readRowMajor(reorderedMatrix)
  const decoded = desubstitute(symbols)
  if (!decoded.ok) return decoded

  return ok<ADFGVXResult>({
    id: nanoid(),
    mode: 'decrypt',
    input: ciphertext,
    output: decoded.value.text,
    schedule: schedule.value,
    symbols,
    truncated: ciphertext.length % key.length,
    droppedSymbol: decoded.value.droppedSymbol,
    matrix,
    reorderedMatrix,
  })
}

const project = (result: Result<ADFGVXResult, CipherError>): Result<string, CipherError> =>
  result.ok ? ok(result.value.output) : result

/** `plaintext` must already be cleaned to `[A-Z0-9]`. */
export const encrypt = (plaintext: string, key: string): Result<string, CipherError> =>
  project(adfgvx_encrypt(plaintext, key))

/** `ciphertext` must already be cleaned to the ADFGVX alphabet. */
export const decrypt = (ciphertext: string, key: string): Result<string, CipherError> =>
  project(adfgvx_decrypt(ciphertext, key))

const KEY_REASON_MESSAGES: Record<InvalidKey['reason'], string> = {
  TooShort: 'is too short (minimum 5 characters)',
  TooLong: 'is too long (maximum 16 characters)',
  NotAlphanumeric: 'contains invalid characters; use letters and digits only',
  HasDuplicates: 'contains duplicate characters',
}

export const describeCipherError = (error: CipherError): string => {
  switch (error.kind) {
    case 'InvalidKey':
      return `The key "${error.key}" ${KEY_REASON_MESSAGES[error.reason]}.`
    case 'UnmappableCharacter':
      return `Character "${error.char}" at position ${error.index + 1} is not in the Polybius square.`
    case 'InvalidSymbol':
      return `Symbol "${error.char}" is not part of the ADFGVX alphabet.`
  }
}

export const ADFGVX_PRESETS = {
  classic: {
    label: 'Classic Example',
    plaintext: 'ATTACKATDAWN',
    key: 'GERMAN',
    description: 'Twenty-four symbols over a six-column key: four full rows, nothing truncated.',
  },
  digits: {
    label: 'Mixed Key',
    plaintext: 'RENDEZVOUS1900',
    key: 'Cipher7',
    description: 'Digits sort before uppercase, uppercase before lowercase.',
  },
  lossy: {
    label: 'Truncation Demo',
    plaintext: 'HELLO',
    key: 'KEYS123',
    description: 'Ten symbols over seven columns: the last three symbols are cut off.',
  },
} as const

export type PresetId = keyof typeof ADFGVX_PRESETS
