import { appConfig } from '../config'
import {
  adfgvx_decrypt,
  adfgvx_encrypt,
  describeCipherError,
  type CipherError,
  type CipherMode,
} from '../lib/adfgvx'
import { validateKey } from '../lib/keySchedule'
import { err, ok, type Result } from '../lib/result'
import { cleanCiphertext, cleanPlaintext, countInvalidSymbols } from '../lib/text'

export interface BatchFile {
  name: string
  content: string
}

export interface BatchOutput {
  source: string
  name: string
  content: string
  truncated: number
  droppedSymbol: boolean
}

export interface InvalidCipherFile {
  kind: 'InvalidCipherFile'
  file: string
  invalidCount: number
}

export interface EmptyBatch {
  kind: 'EmptyBatch'
}

export type BatchError = CipherError | InvalidCipherFile | EmptyBatch

export interface BatchOptions {
  /** Names already present in the destination; generated names skip them. */
  existingNames?: Iterable<string>
  extension?: string
  onProgress?: (done: number, total: number) => void
}

const OUTPUT_BASENAMES: Record<CipherMode, string> = {
  encrypt: 'encrypted',
  decrypt: 'decrypted',
}

export const nextAvailableName = (
  basename: string,
  taken: ReadonlySet<string>,
  extension = appConfig.outputExtension,
): string => {
  let counter = 1
  while (taken.has(`${basename}${counter}${extension}`)) counter += 1
  return `${basename}${counter}${extension}`
}

// Line breaks are not counted; every other character must belong to the alphabet.
const findInvalidCipherFile = (files: BatchFile[]): InvalidCipherFile | null => {
  for (const file of files) {
    const invalidCount = countInvalidSymbols(file.content.replace(/\r?\n/g, ''))
    if (invalidCount > 0) return { kind: 'InvalidCipherFile', file: file.name, invalidCount }
  }
  return null
}

/**
 * Encrypts or decrypts every file with one key. The key is checked before any file
 * is read, and a decrypt batch is refused outright if any file is not ADFGVX text.
 */
export const runBatch = (
  files: BatchFile[],
  mode: CipherMode,
  key: string,
  options: BatchOptions = {},
): Result<BatchOutput[], BatchError> => {
  const validated = validateKey(key)
  if (!validated.ok) return validated
  if (!files.length) return err<EmptyBatch>({ kind: 'EmptyBatch' })

  if (mode === 'decrypt') {
    const invalid = findInvalidCipherFile(files)
    if (invalid) return err(invalid)
  }

  const extension = options.extension ?? appConfig.outputExtension
  const taken = new Set(options.existingNames ?? [])
  const outputs: BatchOutput[] = []

  for (const file of files) {
    const result =
      mode === 'encrypt'
        ? adfgvx_encrypt(cleanPlaintext(file.content), key)
        : adfgvx_decrypt(cleanCiphertext(file.content), key)
    if (!result.ok) return result

    const name = nextAvailableName(OUTPUT_BASENAMES[mode], taken, extension)
    taken.add(name)
    outputs.push({
      source: file.name,
      name,
      content: result.value.output,
      truncated: result.value.truncated,
      droppedSymbol: result.value.droppedSymbol,
    })
    options.onProgress?.(outputs.length, files.length)
  }

  return ok(outputs)
}

export const describeBatchError = (error: BatchError): string => {
  switch (error.kind) {
    case 'InvalidCipherFile':
      return `${error.file} contains ${error.invalidCount} invalid characters for ADFGVX cipher text.`
    case 'EmptyBatch':
      return 'Select at least one file to process.'
    default:
      return describeCipherError(error)
  }
}
