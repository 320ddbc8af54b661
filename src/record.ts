import Constants from './constants.ts'

export type Strand = '+' | '-'

export interface AlignmentFields {
  name: string
  flags: number
  refName?: string
  start?: number
  lengthOnRef: number
  mappingQuality?: number
  CIGAR: string
  nextRefName?: string
  nextStart?: number
  templateLength?: number
  seq?: string
  qual?: string
}

/**
 * One converted alignment. Coordinates are in whatever system the collection
 * was built with; `end` is exclusive, so `end - start` is the length on the
 * reference.
 */
export default class AlignmentRecord {
  public readonly name: string
  public readonly flags: number
  public readonly refName?: string
  public readonly start?: number
  public readonly length_on_ref: number
  public readonly mq?: number
  public readonly CIGAR: string
  public readonly next_ref_name?: string
  public readonly next_pos?: number
  public readonly template_length?: number
  public readonly seq?: string
  public readonly qual?: string

  constructor(args: AlignmentFields) {
    this.name = args.name
    this.flags = args.flags
    this.refName = args.refName
    this.start = args.start
    this.length_on_ref = args.lengthOnRef
    this.mq = args.mappingQuality
    this.CIGAR = args.CIGAR
    this.next_ref_name = args.nextRefName
    this.next_pos = args.nextStart
    this.template_length = args.templateLength
    this.seq = args.seq
    this.qual = args.qual
  }

  get end() {
    return this.start === undefined ? undefined : this.start + this.length_on_ref
  }

  get strand(): Strand {
    return this.isReverseComplemented() ? '-' : '+'
  }

  withRefNames(rename: (refName: string) => string) {
    return new AlignmentRecord({
      name: this.name,
      flags: this.flags,
      refName: this.refName === undefined ? undefined : rename(this.refName),
      start: this.start,
      lengthOnRef: this.length_on_ref,
      mappingQuality: this.mq,
      CIGAR: this.CIGAR,
      nextRefName:
        this.next_ref_name === undefined
          ? undefined
          : rename(this.next_ref_name),
      nextStart: this.next_pos,
      templateLength: this.template_length,
      seq: this.seq,
      qual: this.qual,
    })
  }

  isPaired() {
    return !!(this.flags & Constants.BAM_FPAIRED)
  }

  isProperlyPaired() {
    return !!(this.flags & Constants.BAM_FPROPER_PAIR)
  }

  isSegmentUnmapped() {
    return !!(this.flags & Constants.BAM_FUNMAP)
  }

  isMateUnmapped() {
    return !!(this.flags & Constants.BAM_FMUNMAP)
  }

  isReverseComplemented() {
    return !!(this.flags & Constants.BAM_FREVERSE)
  }

  isMateReverseComplemented() {
    return !!(this.flags & Constants.BAM_FMREVERSE)
  }

  isRead1() {
    return !!(this.flags & Constants.BAM_FREAD1)
  }

  isRead2() {
    return !!(this.flags & Constants.BAM_FREAD2)
  }

  isSecondary() {
    return !!(this.flags & Constants.BAM_FSECONDARY)
  }

  isFailedQc() {
    return !!(this.flags & Constants.BAM_FQCFAIL)
  }

  isDuplicate() {
    return !!(this.flags & Constants.BAM_FDUP)
  }

  isSupplementary() {
    return !!(this.flags & Constants.BAM_FSUPPLEMENTARY)
  }

  toJSON() {
    return {
      name: this.name,
      flags: this.flags,
      refName: this.refName,
      start: this.start,
      end: this.end,
      strand: this.strand,
      mq: this.mq,
      CIGAR: this.CIGAR,
      next_ref_name: this.next_ref_name,
      next_pos: this.next_pos,
      template_length: this.template_length,
      seq: this.seq,
      qual: this.qual,
    }
  }
}
