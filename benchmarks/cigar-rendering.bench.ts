import { bench, describe } from 'vitest'

import { CIGAR_SYMBOLS } from '../src/constants.ts'
import { renderCigar } from '../src/cigar.ts'

import type { CigarOperation, CigarUnit, Read } from '../src/types.ts'

const OPS: CigarOperation[] = ['ALIGNMENT_MATCH', 'INSERT', 'DELETE']

function makeRead(numOps: number): Read {
  const cigar: CigarUnit[] = []
  for (let i = 0; i < numOps; i++) {
    cigar.push({
      operation: OPS[i % 3] ?? 'ALIGNMENT_MATCH',
      operationLength: 10 + (i % 20),
    })
  }
  return { alignment: { cigar } }
}

function renderWithJoin(read: Read) {
  return (read.alignment?.cigar ?? [])
    .map(unit => `${unit.operationLength}${CIGAR_SYMBOLS.get(unit.operation)}`)
    .join('')
}

for (const numOps of [3, 50, 2000]) {
  describe(`CIGAR rendering, ${numOps} ops`, () => {
    const read = makeRead(numOps)

    bench('template literal concatenation (current)', () => {
      renderCigar(read)
    })

    bench('map + join', () => {
      renderWithJoin(read)
    })
  })
}
