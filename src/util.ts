import type { Int64, Position } from './types.ts'

export interface FilterBy {
  flagInclude?: number
  flagExclude?: number
}

export interface BaseOpts {
  signal?: AbortSignal
}

export function filterReadFlag(
  flags: number,
  flagInclude: number,
  flagExclude: number,
) {
  if ((flags & flagInclude) !== flagInclude) {
    return true
  }
  if (flags & flagExclude) {
    return true
  }
  return false
}

export function toInt(value: Int64 | null | undefined) {
  if (value === undefined || value === null) {
    return undefined
  }
  const n = typeof value === 'number' ? value : Number.parseInt(value, 10)
  return Number.isNaN(n) ? undefined : n
}

export function positionOf(position?: Position) {
  return toInt(position?.position)
}

// the page token must survive a field mask, otherwise every search looks
// like a single page
export function withPageTokenField(fields?: string) {
  if (!fields) {
    return undefined
  }
  return fields.includes('nextPageToken') ? fields : `${fields},nextPageToken`
}

export function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === 'object' && obj !== null && !Array.isArray(obj)
}

export function phredToAscii(qual: number[]) {
  let result = ''
  for (const q of qual) {
    result += String.fromCharCode(q + 33)
  }
  return result
}
