import { withPageTokenField } from './util.ts'

import type { BaseOpts } from './util.ts'

export interface SearchOpts extends BaseOpts {
  fields?: string
}

/**
 * One request against a paginated `<resource>/search` endpoint. Resolves to
 * the parsed JSON body; callers narrow it to the shape of their resource.
 */
export interface SearchPageClient {
  searchPage(
    resource: string,
    body: object,
    opts?: SearchOpts,
  ): Promise<unknown>
}

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>

export default class HttpSearchClient implements SearchPageClient {
  private baseUrl: string

  private apiKey?: string

  private headers: Record<string, string>

  private fetch: FetchLike

  constructor(args: {
    baseUrl: string
    apiKey?: string
    headers?: Record<string, string>
    fetch?: FetchLike
  }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, '')
    this.apiKey = args.apiKey
    this.headers = args.headers ?? {}
    this.fetch = args.fetch ?? ((input, init) => fetch(input, init))
  }

  async searchPage(resource: string, body: object, opts: SearchOpts = {}) {
    const base = `${this.baseUrl}/${resource}/search`
    const params = new URLSearchParams()
    const fields = withPageTokenField(opts.fields)
    if (fields) {
      params.set('fields', fields)
    }
    if (this.apiKey) {
      params.set('key', this.apiKey)
    }
    const query = params.toString()
    const url = query ? `${base}?${query}` : base

    const result = await this.fetch(url, {
      method: 'POST',
      signal: opts.signal,
      headers: { ...this.headers, 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
    if (!result.ok) {
      // url may carry the API key, report the endpoint only
      throw new Error(
        `HTTP ${result.status} fetching ${base}: ${await result.text()}`,
      )
    }
    const data: unknown = await result.json()
    return data
  }
}
