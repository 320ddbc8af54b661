import type { AlignmentCollection } from './alignments.ts'
import type AlignmentRecord from './record.ts'

export function toSamLine(record: AlignmentRecord) {
  const rname = record.refName ?? '*'
  const rnext =
    record.next_ref_name === undefined
      ? '*'
      : record.next_ref_name === record.refName
        ? '='
        : record.next_ref_name
  return [
    record.name || '*',
    record.flags,
    rname,
    record.start ?? 0,
    record.mq ?? 255,
    record.CIGAR || '*',
    rnext,
    record.next_pos ?? 0,
    record.template_length ?? 0,
    record.seq || '*',
    record.qual || '*',
  ].join('\t')
}

// SAM body only, no header: reference lengths are not part of a reads search
export function toSamLines(alignments: AlignmentCollection) {
  return alignments.records.map(r => toSamLine(r))
}
