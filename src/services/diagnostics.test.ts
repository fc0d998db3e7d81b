import { describe, expect, it } from 'vitest'
import { diagnoseADFGVXSubmission } from './diagnostics'

const diagnose = (studentCiphertext: string) => {
  const result = diagnoseADFGVXSubmission({ plaintext: 'Attack at dawn', key: 'GERMAN', studentCiphertext })
  if (!result.ok) throw new Error('expected a diagnosis')
  return result.value
}

describe('ADFGVX submission diagnostics', () => {
  it('accepts the correct ciphertext regardless of spacing and case', () => {
    const diagnosis = diagnose('xgffg gggdd ddgvg ggdxf xgxv')
    expect(diagnosis.matchedPattern).toBe('correct')
    expect(diagnosis.score).toBe(1)
    expect(diagnosis.expectedOutput).toBe('XGFFGGGGDDDDGVGGGDXFXGXV')
  })

  it.each([
    ['DGXGXGDGGVGDDGXGFXDGVGFF', 'substitution-only', 0.3],
    ['DDDDGGGGXGXVGVGGXGFFGDXF', 'unsorted-columns', 0.5],
    ['XGDGGXGGDVDGFGDGXXFGDGFV', 'row-readout', 0.5],
    ['GDXFDDDDGGGGXGXVXGFFGVGG', 'swapped-coordinates', 0.6],
    ['XGXVGDXFGVGGDDDDGGGGXGFF', 'descending-sort', 0.5],
  ])('recognises %s as %s', (submission, pattern, credit) => {
    const diagnosis = diagnose(submission)
    expect(diagnosis.matchedPattern).toBe(pattern)
    expect(diagnosis.score).toBe(credit)
    expect(diagnosis.tags).toEqual(['incorrect', pattern])
  })

  it('leaves unknown mistakes unclassified', () => {
    const diagnosis = diagnose('AAAAAAAAAAAAAAAAAAAAAAAA')
    expect(diagnosis.matchedPattern).toBeNull()
    expect(diagnosis.score).toBe(0)
    expect(diagnosis.tags).toEqual(['incorrect', 'unclassified'])
  })

  it('passes key errors through', () => {
    const result = diagnoseADFGVXSubmission({ plaintext: 'HELLO', key: 'AABBCC', studentCiphertext: '' })
    expect(result).toEqual({ ok: false, error: { kind: 'InvalidKey', reason: 'HasDuplicates', key: 'AABBCC' } })
  })
})
