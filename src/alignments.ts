import { cigarLengthOnRef, renderCigar } from './cigar.ts'
import { decodeFlags } from './flags.ts'
import AlignmentRecord from './record.ts'
import { getSeqnameStyle, renameSeqlevel } from './seqnameStyle.ts'
import { filterReadFlag, phredToAscii, positionOf } from './util.ts'

import type { ReadConverter } from './converter.ts'
import type { Read } from './types.ts'
import type { FilterBy } from './util.ts'

export interface AlignmentOpts {
  oneBasedCoord?: boolean
  seqnameStyle?: string
  filterBy?: FilterBy
}

export class AlignmentCollection implements Iterable<AlignmentRecord> {
  private items: AlignmentRecord[]

  constructor(records: readonly AlignmentRecord[] = []) {
    this.items = [...records]
  }

  get records(): readonly AlignmentRecord[] {
    return this.items
  }

  get length() {
    return this.records.length
  }

  [Symbol.iterator]() {
    return this.records[Symbol.iterator]()
  }

  append(other: AlignmentCollection) {
    return new AlignmentCollection([...this.items, ...other.items])
  }

  // grows this collection in place, for accumulators owned by one caller
  extend(other: AlignmentCollection) {
    for (const record of other.items) {
      this.items.push(record)
    }
    return this
  }

  seqnames() {
    const seen = new Set<string>()
    for (const record of this.records) {
      if (record.refName !== undefined) {
        seen.add(record.refName)
      }
    }
    return [...seen]
  }

  renameSeqlevels(style: string) {
    getSeqnameStyle(style)
    return new AlignmentCollection(
      this.records.map(r => r.withRefNames(n => renameSeqlevel(n, style))),
    )
  }
}

function toAlignment(read: Read, oneBasedCoord: boolean, style: string) {
  const shift = oneBasedCoord ? 1 : 0
  const start = positionOf(read.alignment?.position)
  const nextStart = positionOf(read.nextMatePosition)
  const refName = read.alignment?.position?.referenceName
  const nextRefName = read.nextMatePosition?.referenceName
  return new AlignmentRecord({
    name: read.fragmentName ?? '',
    flags: decodeFlags(read),
    refName: refName === undefined ? undefined : renameSeqlevel(refName, style),
    start: start === undefined ? undefined : start + shift,
    lengthOnRef: cigarLengthOnRef(read),
    mappingQuality: read.alignment?.mappingQuality,
    CIGAR: renderCigar(read),
    nextRefName:
      nextRefName === undefined
        ? undefined
        : renameSeqlevel(nextRefName, style),
    nextStart: nextStart === undefined ? undefined : nextStart + shift,
    templateLength: read.fragmentLength,
    seq: read.alignedSequence,
    qual:
      read.alignedQuality === undefined
        ? undefined
        : phredToAscii(read.alignedQuality),
  })
}

/**
 * Convert API reads to an alignment collection. API positions are 0-based;
 * with `oneBasedCoord` (the default) they are shifted to the 1-based
 * convention of SAM. Reference names are respelled to `seqnameStyle`.
 */
export function toAlignments(
  reads: readonly Read[],
  { oneBasedCoord = true, seqnameStyle = 'UCSC', filterBy }: AlignmentOpts = {},
) {
  getSeqnameStyle(seqnameStyle)
  const { flagInclude = 0, flagExclude = 0 } = filterBy ?? {}
  const records: AlignmentRecord[] = []
  for (const read of reads) {
    const record = toAlignment(read, oneBasedCoord, seqnameStyle)
    if (filterBy && filterReadFlag(record.flags, flagInclude, flagExclude)) {
      continue
    }
    records.push(record)
  }
  return new AlignmentCollection(records)
}

export function alignmentsConverter(
  opts: AlignmentOpts = {},
): ReadConverter<AlignmentCollection> {
  getSeqnameStyle(opts.seqnameStyle ?? 'UCSC')
  return {
    empty: () => new AlignmentCollection(),
    convert: reads => toAlignments(reads, opts),
    append: (acc, batch) => acc.extend(batch),
  }
}
