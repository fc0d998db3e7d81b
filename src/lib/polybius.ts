import { err, ok, type Result } from './result'

export type SymbolPair = readonly [row: string, column: string]

export interface UnmappableCharacter {
  kind: 'UnmappableCharacter'
  char: string
  index: number
}

export interface InvalidSymbol {
  kind: 'InvalidSymbol'
  char: string
}

export const ADFGVX = ['A', 'D', 'F', 'G', 'V', 'X'] as const

export const POLYBIUS_SQUARE: readonly (readonly string[])[] = [
  ['P', 'H', '0', 'Q', 'G', '6'],
  ['4', 'M', 'E', 'A', '1', 'Y'],
  ['L', '2', 'N', 'O', 'F', 'D'],
  ['X', 'K', 'R', '3', 'C', 'V'],
  ['S', '5', 'Z', 'W', '7', 'B'],
  ['J', '9', 'U', 'T', 'I', '8'],
]

const symbolIndex = (symbol: string): number =>
  ADFGVX.findIndex((candidate) => candidate === symbol)

export const isAdfgvxSymbol = (char: string): boolean => symbolIndex(char) !== -1

/**
 * Looks `char` up in the square and returns its row label followed by its column label.
 * `index` is only carried into the failure so callers can point at the offending position.
 */
export const encodeChar = (
  char: string,
  index = 0,
): Result<SymbolPair, UnmappableCharacter> => {
  for (let row = 0; row < POLYBIUS_SQUARE.length; row += 1) {
    const column = POLYBIUS_SQUARE[row].findIndex((cell) => cell === char)
    if (column !== -1) {
      const pair: SymbolPair = [ADFGVX[row], ADFGVX[column]]
      return ok(pair)
    }
  }
  return err<UnmappableCharacter>({ kind: 'UnmappableCharacter', char, index })
}

export const decodeSymbolPair = (
  rowSymbol: string,
  columnSymbol: string,
): Result<string, InvalidSymbol> => {
  const row = symbolIndex(rowSymbol)
  if (row === -1) return err<InvalidSymbol>({ kind: 'InvalidSymbol', char: rowSymbol })
  const column = symbolIndex(columnSymbol)
  if (column === -1) return err<InvalidSymbol>({ kind: 'InvalidSymbol', char: columnSymbol })
  return ok(POLYBIUS_SQUARE[row][column])
}
