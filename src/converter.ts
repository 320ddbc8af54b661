import type { Read } from './types.ts'

/**
 * Turns pages of reads into an accumulated value of type T. `getReads` starts
 * from `empty()`, converts each page as it arrives and folds it in with
 * `append`, so only converted data is held across pages.
 */
export interface ReadConverter<T> {
  empty(): T
  convert(reads: Read[]): T
  append(acc: T, batch: T): T
}

export const rawReadsConverter: ReadConverter<Read[]> = {
  empty: () => [],
  convert: reads => reads,
  append: (acc, batch) => {
    for (const read of batch) {
      acc.push(read)
    }
    return acc
  },
}
