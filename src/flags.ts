import Constants from './constants.ts'
import { positionOf } from './util.ts'

import type { Read } from './types.ts'

/**
 * Rebuild the SAM flag field of a read from the boolean and enumerated
 * attributes of the API record. Unset booleans count as false; a missing
 * read or mate position marks that segment unmapped.
 */
export function decodeFlags(read: Read) {
  let flags = 0
  if (read.numberReads === 2) {
    flags |= Constants.BAM_FPAIRED
  }
  if (read.properPlacement === true) {
    flags |= Constants.BAM_FPROPER_PAIR
  }
  if (positionOf(read.alignment?.position) === undefined) {
    flags |= Constants.BAM_FUNMAP
  }
  if (positionOf(read.nextMatePosition) === undefined) {
    flags |= Constants.BAM_FMUNMAP
  }
  if (read.alignment?.position?.reverseStrand === true) {
    flags |= Constants.BAM_FREVERSE
  }
  if (read.nextMatePosition?.reverseStrand === true) {
    flags |= Constants.BAM_FMREVERSE
  }
  if (read.readNumber === 0) {
    flags |= Constants.BAM_FREAD1
  }
  if (read.readNumber === 1) {
    flags |= Constants.BAM_FREAD2
  }
  if (read.secondaryAlignment === true) {
    flags |= Constants.BAM_FSECONDARY
  }
  if (read.failedVendorQualityChecks === true) {
    flags |= Constants.BAM_FQCFAIL
  }
  if (read.duplicateFragment === true) {
    flags |= Constants.BAM_FDUP
  }
  if (read.supplementaryAlignment === true) {
    flags |= Constants.BAM_FSUPPLEMENTARY
  }
  return flags
}
