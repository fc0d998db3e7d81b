import {
  adfgvx_encrypt,
  fillRowMajor,
  readColumnMajor,
  readRowMajor,
  reorderMatrixColumns,
  substitute,
  type CipherError,
} from '../lib/adfgvx'
import type { KeySchedule } from '../lib/keySchedule'
import { ok, type Result } from '../lib/result'
import { cleanCiphertext, cleanPlaintext } from '../lib/text'

interface VariantOptions {
  skipTransposition?: boolean
  skipReorder?: boolean
  readRows?: boolean
  swapCoordinates?: boolean
  descendingOrder?: boolean
}

const swapPairs = (symbols: string): string => {
  let out = ''
  for (let i = 0; i + 1 < symbols.length; i += 2) {
    out += symbols[i + 1] + symbols[i]
  }
  return out
}

// Plaintext is already known to substitute cleanly at this point.
const runVariant = (plaintext: string, schedule: KeySchedule, options: VariantOptions): string => {
  const substituted = substitute(plaintext)
  if (!substituted.ok) return ''
  const symbols = options.swapCoordinates ? swapPairs(substituted.value) : substituted.value
  if (options.skipTransposition) return symbols

  const matrix = fillRowMajor(symbols, schedule.originalKey)
  const order = options.descendingOrder ? [...schedule.sortedIndices].reverse() : schedule.sortedIndices
  const reordered = options.skipReorder ? matrix : reorderMatrixColumns(matrix, order)
  return options.readRows ? readRowMajor(reordered) : readColumnMajor(reordered)
}

export interface DiagnosisResult {
  matchedPattern: string | null
  message: string
  variantMatched?: string
  expectedOutput: string
  studentOutput: string
  score: number
  tags: string[]
}

interface DiagnoseInput {
  plaintext: string
  key: string
  studentCiphertext: string
}

const patterns: { code: string; label: string; options: VariantOptions; description: string; credit: number }[] = [
  {
    code: 'substitution-only',
    label: 'Skipped transposition',
    options: { skipTransposition: true },
    description: 'Output is the Polybius substitution with no columnar transposition.',
    credit: 0.3,
  },
  {
    code: 'unsorted-columns',
    label: 'Columns not reordered',
    options: { skipReorder: true },
    description: 'Columns were read out in key order instead of sorted key order.',
    credit: 0.5,
  },
  {
    code: 'row-readout',
    label: 'Read by rows',
    options: { readRows: true },
    description: 'Columns were reordered but the matrix was read row by row.',
    credit: 0.5,
  },
  {
    code: 'swapped-coordinates',
    label: 'Column before row',
    options: { swapCoordinates: true },
    description: 'Each character was written as column symbol then row symbol.',
    credit: 0.6,
  },
  {
    code: 'descending-sort',
    label: 'Reverse key order',
    options: { descendingOrder: true },
    description: 'Columns were taken in descending key order.',
    credit: 0.5,
  },
]

export const diagnoseADFGVXSubmission = (input: DiagnoseInput): Result<DiagnosisResult, CipherError> => {
  const plaintext = cleanPlaintext(input.plaintext)
  const studentOutput = cleanCiphertext(input.studentCiphertext)

  const expected = adfgvx_encrypt(plaintext, input.key)
  if (!expected.ok) return expected
  const expectedOutput = expected.value.output

  if (studentOutput === expectedOutput) {
    return ok({
      matchedPattern: 'correct',
      message: 'Answer matches expected ciphertext.',
      expectedOutput,
      studentOutput,
      score: 1,
      tags: ['correct'],
    })
  }

  for (const pattern of patterns) {
    const variantOutput = runVariant(plaintext, expected.value.schedule, pattern.options)
    if (variantOutput === studentOutput) {
      const credit = Math.min(1, Math.max(0, pattern.credit))
      return ok({
        matchedPattern: pattern.code,
        variantMatched: pattern.label,
        message: pattern.description,
        expectedOutput,
        studentOutput,
        score: credit,
        tags: ['incorrect', pattern.code],
      })
    }
  }

  return ok({
    matchedPattern: null,
    message: 'No known mistake pattern matched. Likely multiple or different errors.',
    expectedOutput,
    studentOutput,
    score: 0,
    tags: ['incorrect', 'unclassified'],
  })
}
