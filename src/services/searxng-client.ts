import { z } from "zod"
import type { SearxngSettings } from "../config"
import type { FetchLike, SearchProviderClient, SearchRequest, SearchResult } from "./search-provider"
import { safeHostname } from "./search-provider"

const SearxngResultSchema = z.object({
  url: z.string().catch(""),
  title: z.string().catch("Untitled"),
  content: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  publishedDate: z.string().optional().catch(undefined),
})

const SearxngResponseSchema = z.object({
  results: z.array(z.unknown()).catch([]),
})

export class SearxngNotConfiguredError extends Error {
  constructor() {
    super("SHOPWARDEN_SEARXNG_BASE_URL is not configured")
    this.name = "SearxngNotConfiguredError"
  }
}

interface SearxngClientDependencies {
  fetchImpl?: FetchLike
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
}

export class SearxngClient implements SearchProviderClient {
  readonly name = "searxng" as const

  private readonly fetchImpl: FetchLike
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout

  constructor(
    private readonly settings: SearxngSettings,
    dependencies: SearxngClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.setTimeoutImpl = dependencies.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = dependencies.clearTimeoutImpl ?? clearTimeout
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    if (!this.settings.baseUrl) {
      throw new SearxngNotConfiguredError()
    }

    // safesearch 1 is "moderate" on the SearXNG scale of 0 to 2.
    const query = new URLSearchParams({
      q: request.query,
      format: "json",
      safesearch: "1",
    })

    const endpoint = `${this.settings.baseUrl}/search?${query.toString()}`

    const controller = new AbortController()
    const timeoutHandle = this.setTimeoutImpl(() => controller.abort(), this.settings.timeoutMs)
    const signal = request.signal ? AbortSignal.any([controller.signal, request.signal]) : controller.signal

    let response: Response
    try {
      response = await this.fetchImpl(endpoint, {
        method: "GET",
        headers: {
          Accept: "application/json",
        },
        signal,
      })
    } finally {
      this.clearTimeoutImpl(timeoutHandle)
    }

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`SearXNG API returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    const json: unknown = await response.json()
    const items = SearxngResponseSchema.catch({ results: [] }).parse(json).results

    const normalized: SearchResult[] = []
    for (const item of items) {
      const parsed = SearxngResultSchema.safeParse(item)
      if (!parsed.success || !parsed.data.url) {
        continue
      }

      normalized.push({
        url: parsed.data.url,
        title: parsed.data.title,
        snippet: parsed.data.content ?? parsed.data.description ?? "",
        source: safeHostname(parsed.data.url),
        published: parsed.data.publishedDate,
      })
    }

    return normalized.slice(0, request.count)
  }
}
