import { isAdfgvxSymbol } from './polybius'

const cleanLines = (raw: string, pattern: RegExp): string =>
  raw
    .split(/\r?\n/)
    .map((line) => line.trim().replace(pattern, '').toUpperCase())
    .join('')

// Prepares free text for encryption: letters and digits only, uppercased, lines joined.
export const cleanPlaintext = (raw: string): string => cleanLines(raw, /[^a-zA-Z0-9]/g)

export const cleanCiphertext = (raw: string): string => cleanLines(raw, /[^ADFGVXadfgvx]/g)

export const countInvalidSymbols = (text: string): number =>
  text.split('').filter((char) => !isAdfgvxSymbol(char)).length

export const isValidCiphertext = (text: string): boolean => countInvalidSymbols(text) === 0

/** Groups text into blocks of `size` for display, e.g. `ADFGV XADFG`. */
export const groupBlocks = (text: string, size = 5): string => {
  const blocks: string[] = []
  for (let i = 0; i < text.length; i += size) {
    blocks.push(text.slice(i, i + size))
  }
  return blocks.join(' ')
}
