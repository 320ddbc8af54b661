import { SEQNAME_STYLES, renameSeqlevel } from '../src/index.ts'

describe('renameSeqlevel', () => {
  it('adds the chr prefix for UCSC', () => {
    expect(renameSeqlevel('22', 'UCSC')).toBe('chr22')
    expect(renameSeqlevel('chr22', 'UCSC')).toBe('chr22')
    expect(renameSeqlevel('x', 'UCSC')).toBe('chrX')
    expect(renameSeqlevel('CHR7', 'UCSC')).toBe('chr7')
  })

  it('strips the prefix for NCBI and Ensembl', () => {
    expect(renameSeqlevel('chr22', 'NCBI')).toBe('22')
    expect(renameSeqlevel('chrX', 'Ensembl')).toBe('X')
    expect(renameSeqlevel('Y', 'Ensembl')).toBe('Y')
  })

  it('respells the mitochondrion', () => {
    expect(renameSeqlevel('MT', 'UCSC')).toBe('chrM')
    expect(renameSeqlevel('chrM', 'NCBI')).toBe('MT')
    expect(renameSeqlevel('M', 'Ensembl')).toBe('MT')
  })

  it('leaves other sequence names alone', () => {
    expect(renameSeqlevel('GL000192.1', 'UCSC')).toBe('GL000192.1')
    expect(renameSeqlevel('chr23', 'NCBI')).toBe('chr23')
    expect(renameSeqlevel('chr1_random', 'NCBI')).toBe('chr1_random')
  })

  it('rejects an unknown style', () => {
    expect(() => renameSeqlevel('22', 'hg19')).toThrow(
      'Unknown reference naming style: hg19',
    )
  })

  it('rejects names inherited from Object.prototype', () => {
    for (const style of ['toString', 'hasOwnProperty', 'constructor']) {
      expect(() => renameSeqlevel('22', style)).toThrow(
        `Unknown reference naming style: ${style}`,
      )
    }
  })

  it('lists the known styles', () => {
    expect([...SEQNAME_STYLES.keys()]).toEqual(['UCSC', 'NCBI', 'Ensembl'])
    expect(Object.isFrozen(SEQNAME_STYLES.get('UCSC'))).toBe(true)
  })
})
