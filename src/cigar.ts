import { CIGAR_CONSUMES_REF, CIGAR_SYMBOLS } from './constants.ts'
import { toInt } from './util.ts'

import type { CigarUnit, Read } from './types.ts'

function symbolFor(unit: CigarUnit) {
  const symbol = CIGAR_SYMBOLS.get(unit.operation)
  if (symbol === undefined) {
    throw new Error(`Unknown CIGAR operation: ${unit.operation}`)
  }
  return symbol
}

// template literal concatenation, see benchmarks/cigar-rendering.bench.ts
export function renderCigar(read: Read) {
  const cigar = read.alignment?.cigar ?? []
  let result = ''
  for (const unit of cigar) {
    result += `${unit.operationLength}${symbolFor(unit)}`
  }
  return result
}

export function cigarLengthOnRef(read: Read) {
  const cigar = read.alignment?.cigar ?? []
  let lref = 0
  for (const unit of cigar) {
    symbolFor(unit)
    if (CIGAR_CONSUMES_REF.has(unit.operation)) {
      lref += toInt(unit.operationLength) ?? 0
    }
  }
  return lref
}
