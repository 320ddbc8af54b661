import { Constants, decodeFlags } from '../src/index.ts'

import type { Read } from '../src/index.ts'

describe('decodeFlags', () => {
  it('decodes a properly paired first read', () => {
    const read: Read = {
      numberReads: 2,
      properPlacement: true,
      readNumber: 0,
      alignment: {
        position: { position: 100, referenceName: '22', reverseStrand: false },
      },
      nextMatePosition: {
        position: 250,
        referenceName: '22',
        reverseStrand: true,
      },
    }
    const flags = decodeFlags(read)
    expect(flags).toBe(99)
    expect(flags & Constants.BAM_FPAIRED).toBeTruthy()
    expect(flags & Constants.BAM_FPROPER_PAIR).toBeTruthy()
    expect(flags & Constants.BAM_FREAD1).toBeTruthy()
    expect(flags & Constants.BAM_FUNMAP).toBe(0)
    expect(flags & Constants.BAM_FREAD2).toBe(0)
  })

  it('decodes its reverse strand mate', () => {
    const read: Read = {
      numberReads: 2,
      properPlacement: true,
      readNumber: 1,
      alignment: {
        position: { position: 250, referenceName: '22', reverseStrand: true },
      },
      nextMatePosition: {
        position: 100,
        referenceName: '22',
        reverseStrand: false,
      },
    }
    expect(decodeFlags(read)).toBe(147)
  })

  it('marks an empty record as unmapped with an unmapped mate', () => {
    expect(decodeFlags({})).toBe(12)
  })

  it('keeps pairing bits for an unmapped read', () => {
    expect(decodeFlags({ numberReads: 2, readNumber: 1 })).toBe(141)
  })

  it('treats position zero as mapped', () => {
    expect(
      decodeFlags({
        alignment: { position: { position: 0 } },
        nextMatePosition: { position: '0' },
      }),
    ).toBe(0)
  })

  it('treats a null position as unmapped', () => {
    expect(decodeFlags({ alignment: { position: { position: null } } })).toBe(
      12,
    )
  })

  it('accepts string encoded positions', () => {
    expect(
      decodeFlags({
        alignment: { position: { position: '16051400' } },
        nextMatePosition: { position: '16051600' },
      }),
    ).toBe(0)
  })

  it('sets every bit independently', () => {
    const read: Read = {
      numberReads: 2,
      properPlacement: true,
      readNumber: 0,
      secondaryAlignment: true,
      failedVendorQualityChecks: true,
      duplicateFragment: true,
      supplementaryAlignment: true,
      alignment: { position: { reverseStrand: true } },
      nextMatePosition: { reverseStrand: true },
    }
    expect(decodeFlags(read)).toBe(3967)
  })

  it('ignores explicit false values', () => {
    const read: Read = {
      numberReads: 1,
      properPlacement: false,
      secondaryAlignment: false,
      failedVendorQualityChecks: false,
      duplicateFragment: false,
      supplementaryAlignment: false,
      alignment: { position: { position: 5, reverseStrand: false } },
      nextMatePosition: { position: 9, reverseStrand: false },
    }
    expect(decodeFlags(read)).toBe(0)
  })
})
