export { default as Constants, CIGAR_SYMBOLS } from './constants.ts'
export { default as HttpSearchClient } from './searchClient.ts'
export { default as ReadsClient, getReads, getReadsPage, parseReadsPage } from './reads.ts'
export { default as AlignmentRecord } from './record.ts'
export {
  AlignmentCollection,
  alignmentsConverter,
  toAlignments,
} from './alignments.ts'
export { rawReadsConverter } from './converter.ts'
export { decodeFlags } from './flags.ts'
export { cigarLengthOnRef, renderCigar } from './cigar.ts'
export { SEQNAME_STYLES, renameSeqlevel } from './seqnameStyle.ts'
export { toSamLine, toSamLines } from './sam.ts'
export { withPageTokenField } from './util.ts'

export type { AlignmentOpts } from './alignments.ts'
export type { ReadConverter } from './converter.ts'
export type { AlignmentFields, Strand } from './record.ts'
export type {
  ConvertedReadsOpts,
  ReadsOpts,
  ReadsPageOpts,
} from './reads.ts'
export type { FetchLike, SearchOpts, SearchPageClient } from './searchClient.ts'
export type { SeqnameStyleRule } from './seqnameStyle.ts'
export type {
  CigarOperation,
  CigarUnit,
  Int64,
  LinearAlignment,
  Position,
  Read,
  ReadsPage,
  SearchReadsRequest,
} from './types.ts'
export type { BaseOpts, FilterBy } from './util.ts'
