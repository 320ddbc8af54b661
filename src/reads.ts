import QuickLRU from 'quick-lru'

import { READS_RESOURCE } from './constants.ts'
import { rawReadsConverter } from './converter.ts'
import { isRecord } from './util.ts'

import type { ReadConverter } from './converter.ts'
import type { SearchPageClient } from './searchClient.ts'
import type { Read, ReadsPage, SearchReadsRequest } from './types.ts'
import type { BaseOpts } from './util.ts'

export interface ReadsPageOpts extends BaseOpts {
  fields?: string
  pageToken?: string
}

export interface ReadsOpts extends BaseOpts {
  fields?: string
  statusCallback?: (message: string) => void
}

export interface ConvertedReadsOpts<T> extends ReadsOpts {
  converter: ReadConverter<T>
}

const defaultStatusCallback = (message: string) => {
  console.info(message)
}

function isRead(obj: unknown): obj is Read {
  return isRecord(obj)
}

export function parseReadsPage(data: unknown): ReadsPage {
  if (!isRecord(data)) {
    throw new Error('Malformed reads search response: expected a JSON object')
  }
  const { alignments, nextPageToken } = data
  const reads: Read[] = []
  if (alignments !== undefined) {
    if (!Array.isArray(alignments)) {
      throw new Error(
        'Malformed reads search response: alignments is not a list',
      )
    }
    for (const read of alignments) {
      if (!isRead(read)) {
        throw new Error(
          'Malformed reads search response: read is not an object',
        )
      }
      reads.push(read)
    }
  }
  if (typeof nextPageToken === 'string') {
    // an empty token ends the result set just like a missing one
    return { reads, nextPageToken: nextPageToken || undefined }
  }
  if (nextPageToken !== undefined && nextPageToken !== null) {
    throw new Error(
      'Malformed reads search response: nextPageToken is not a string',
    )
  }
  return { reads }
}

function copyPage(page: ReadsPage): ReadsPage {
  return { ...page, reads: structuredClone(page.reads) }
}

export default class ReadsClient {
  public client: SearchPageClient

  // resolved pages by request; callers only ever get copies
  public pageCache?: QuickLRU<string, ReadsPage>

  constructor({
    client,
    pageCacheSize = 0,
  }: {
    client: SearchPageClient
    pageCacheSize?: number
  }) {
    this.client = client
    if (pageCacheSize > 0) {
      this.pageCache = new QuickLRU<string, ReadsPage>({
        maxSize: pageCacheSize,
      })
    }
  }

  /**
   * Fetch one page of reads overlapping `[start, end)` on `chromosome`.
   * Coordinates are 0-based, as the API defines them; they are passed through
   * without validation.
   */
  async getReadsPage(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    opts: ReadsPageOpts = {},
  ) {
    const { fields, pageToken, signal } = opts
    const body: SearchReadsRequest = {
      readGroupSetIds: [readGroupSetId],
      referenceName: chromosome,
      start,
      end,
      pageToken,
    }
    const cache = this.pageCache
    if (!cache) {
      return this.fetchPage(body, fields, signal)
    }
    const key = JSON.stringify([body, fields ?? null])
    const cached = cache.get(key)
    if (cached) {
      return copyPage(cached)
    }
    // each caller fetches with its own signal; only a settled page is shared
    const page = await this.fetchPage(body, fields, signal)
    cache.set(key, copyPage(page))
    return page
  }

  private async fetchPage(
    body: SearchReadsRequest,
    fields?: string,
    signal?: AbortSignal,
  ) {
    const data = await this.client.searchPage(READS_RESOURCE, body, {
      fields,
      signal,
    })
    return parseReadsPage(data)
  }

  /**
   * Walk every page of the query in server order, yielding the reads of each
   * page as soon as it arrives. Each request waits for the previous page's
   * token.
   */
  async *iterateReadsPages(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    opts: ReadsOpts = {},
  ) {
    const { fields, signal, statusCallback = defaultStatusCallback } = opts
    let pageToken: string | undefined
    while (true) {
      const page = await this.getReadsPage(
        readGroupSetId,
        chromosome,
        start,
        end,
        { fields, signal, pageToken },
      )
      pageToken = page.nextPageToken
      yield page.reads
      if (pageToken === undefined) {
        break
      }
      statusCallback(
        `Continuing read query with the nextPageToken: ${pageToken}`,
      )
    }
    statusCallback('Reads are now available.')
  }

  /**
   * Fetch all reads in the range. With a converter, each page is converted
   * as it arrives and only the converted value is kept; without one the raw
   * reads are returned in a single array.
   */
  getReads<T>(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    opts: ConvertedReadsOpts<T>,
  ): Promise<T>
  getReads(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    opts?: ReadsOpts,
  ): Promise<Read[]>
  getReads<T>(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    opts: ReadsOpts & { converter?: ReadConverter<T> } = {},
  ) {
    const { converter } = opts
    return converter
      ? this.accumulate(readGroupSetId, chromosome, start, end, converter, opts)
      : this.accumulate(
          readGroupSetId,
          chromosome,
          start,
          end,
          rawReadsConverter,
          opts,
        )
  }

  private async accumulate<U>(
    readGroupSetId: string,
    chromosome: string,
    start: number,
    end: number,
    converter: ReadConverter<U>,
    opts: ReadsOpts,
  ) {
    let acc = converter.empty()
    for await (const reads of this.iterateReadsPages(
      readGroupSetId,
      chromosome,
      start,
      end,
      opts,
    )) {
      acc = converter.append(acc, converter.convert(reads))
    }
    return acc
  }

  clearPageCache() {
    this.pageCache?.clear()
  }
}

export function getReadsPage(
  client: SearchPageClient,
  readGroupSetId: string,
  chromosome: string,
  start: number,
  end: number,
  opts?: ReadsPageOpts,
) {
  return new ReadsClient({ client, pageCacheSize: 0 }).getReadsPage(
    readGroupSetId,
    chromosome,
    start,
    end,
    opts,
  )
}

export function getReads<T>(
  client: SearchPageClient,
  readGroupSetId: string,
  chromosome: string,
  start: number,
  end: number,
  opts: ConvertedReadsOpts<T>,
): Promise<T>
export function getReads(
  client: SearchPageClient,
  readGroupSetId: string,
  chromosome: string,
  start: number,
  end: number,
  opts?: ReadsOpts,
): Promise<Read[]>
export function getReads<T>(
  client: SearchPageClient,
  readGroupSetId: string,
  chromosome: string,
  start: number,
  end: number,
  opts: ReadsOpts & { converter?: ReadConverter<T> } = {},
) {
  const reads = new ReadsClient({ client, pageCacheSize: 0 })
  const { converter } = opts
  return converter
    ? reads.getReads(readGroupSetId, chromosome, start, end, {
        ...opts,
        converter,
      })
    : reads.getReads(readGroupSetId, chromosome, start, end, opts)
}
