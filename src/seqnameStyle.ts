export interface SeqnameStyleRule {
  prefix: string
  mitochondrion: string
}

export const SEQNAME_STYLES: ReadonlyMap<
  string,
  Readonly<SeqnameStyleRule>
> = new Map<string, Readonly<SeqnameStyleRule>>([
  ['UCSC', Object.freeze({ prefix: 'chr', mitochondrion: 'chrM' })],
  ['NCBI', Object.freeze({ prefix: '', mitochondrion: 'MT' })],
  ['Ensembl', Object.freeze({ prefix: '', mitochondrion: 'MT' })],
])

const NUCLEAR = /^(?:chr)?([1-9]|1\d|2[0-2]|X|Y)$/i
const MITOCHONDRIAL = /^(?:chr)?(?:M|MT)$/i

export function getSeqnameStyle(style: string) {
  const rule = SEQNAME_STYLES.get(style)
  if (rule === undefined) {
    throw new Error(
      `Unknown reference naming style: ${style} (expected one of ${[...SEQNAME_STYLES.keys()].join(', ')})`,
    )
  }
  return rule
}

/**
 * Spell a chromosome name the way `style` does. Only the primary human
 * chromosomes are recognised; unplaced contigs and accessions come back as
 * given.
 */
export function renameSeqlevel(name: string, style: string) {
  const rule = getSeqnameStyle(style)
  if (MITOCHONDRIAL.test(name)) {
    return rule.mitochondrion
  }
  const match = NUCLEAR.exec(name)
  if (match?.[1] !== undefined) {
    return `${rule.prefix}${match[1].toUpperCase()}`
  }
  return name
}
