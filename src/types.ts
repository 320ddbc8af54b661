export type CigarOperation =
  | 'ALIGNMENT_MATCH'
  | 'CLIP_HARD'
  | 'CLIP_SOFT'
  | 'DELETE'
  | 'INSERT'
  | 'PAD'
  | 'SEQUENCE_MATCH'
  | 'SEQUENCE_MISMATCH'
  | 'SKIP'

// 64-bit integers are sent as JSON strings by the API, so numeric fields
// that can exceed 2^31 accept either form
export type Int64 = number | string

export interface CigarUnit {
  operation: CigarOperation
  operationLength: Int64
}

export interface Position {
  position?: Int64 | null
  referenceName?: string
  reverseStrand?: boolean
}

export interface LinearAlignment {
  position?: Position
  mappingQuality?: number
  cigar?: CigarUnit[]
}

/**
 * A read as returned by the reads search endpoint. All fields are optional:
 * the server omits unset values and a field mask may strip the rest.
 */
export interface Read {
  id?: string
  readGroupId?: string
  readGroupSetId?: string
  fragmentName?: string
  properPlacement?: boolean
  duplicateFragment?: boolean
  fragmentLength?: number
  readNumber?: number
  numberReads?: number
  failedVendorQualityChecks?: boolean
  alignment?: LinearAlignment
  secondaryAlignment?: boolean
  supplementaryAlignment?: boolean
  alignedSequence?: string
  alignedQuality?: number[]
  nextMatePosition?: Position
}

export interface SearchReadsRequest {
  readGroupSetIds: string[]
  referenceName: string
  start: number
  end: number
  pageToken?: string
}

export interface ReadsPage {
  reads: Read[]
  nextPageToken?: string
}
