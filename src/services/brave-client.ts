import { setTimeout as delay } from "node:timers/promises"
import { z } from "zod"
import type { BraveSettings } from "../config"
import { RateLimiterQueue } from "./rate-limiter"
import type { FetchLike, SearchProviderClient, SearchRequest, SearchResult } from "./search-provider"
import { safeHostname } from "./search-provider"

const BraveResultSchema = z.object({
  url: z.string().catch(""),
  title: z.string().catch("Untitled"),
  description: z.string().catch(""),
  age: z.string().optional().catch(undefined),
})

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(z.unknown()).catch([]),
    })
    .optional()
    .catch(undefined),
})

export class BraveNotConfiguredError extends Error {
  constructor() {
    super("SHOPWARDEN_BRAVE_API_KEY is not configured")
    this.name = "BraveNotConfiguredError"
  }
}

interface BraveClientDependencies {
  fetchImpl?: FetchLike
  limiter?: RateLimiterQueue
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  random?: () => number
}

export class BraveClient implements SearchProviderClient {
  readonly name = "brave" as const

  private readonly limiter: RateLimiterQueue
  private readonly fetchImpl: FetchLike
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly random: () => number

  constructor(
    private readonly settings: BraveSettings,
    dependencies: BraveClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.sleep = dependencies.sleep ?? ((ms) => delay(ms))
    this.now = dependencies.now ?? Date.now
    this.random = dependencies.random ?? Math.random
    this.limiter =
      dependencies.limiter ??
      new RateLimiterQueue({
        requestsPerSecond: settings.requestsPerSecond,
        maxQueued: settings.queueMax,
        label: "Brave request",
        now: this.now,
        sleep: this.sleep,
      })
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    if (!this.settings.apiKey) {
      throw new BraveNotConfiguredError()
    }

    const query = new URLSearchParams({
      q: request.query,
      count: String(request.count),
      safesearch: "moderate",
    })

    const endpoint = `${this.settings.baseUrl}/web/search?${query.toString()}`
    const response = await this.searchWithRetry(endpoint, request.signal)

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`Brave API returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    const json: unknown = await response.json()
    const items = BraveResponseSchema.catch({}).parse(json).web?.results ?? []

    const normalized: SearchResult[] = []
    for (const item of items) {
      const parsed = BraveResultSchema.safeParse(item)
      if (!parsed.success || !parsed.data.url) {
        continue
      }

      normalized.push({
        url: parsed.data.url,
        title: parsed.data.title,
        snippet: parsed.data.description,
        source: safeHostname(parsed.data.url),
        published: parsed.data.age,
      })
    }

    return normalized.slice(0, request.count)
  }

  private async searchWithRetry(endpoint: string, signal?: AbortSignal): Promise<Response> {
    const maxAttempts = this.settings.retryOn429 ? this.settings.retryMax + 1 : 1

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      signal?.throwIfAborted()
      const response = await this.limiter.schedule(() =>
        this.fetchImpl(endpoint, {
          method: "GET",
          headers: {
            Accept: "application/json",
            "X-Subscription-Token": this.settings.apiKey,
          },
          signal,
        }),
      )

      const shouldRetry = response.status === 429 && this.settings.retryOn429 && attempt < maxAttempts

      if (!shouldRetry) {
        return response
      }

      await this.sleep(this.computeRetryDelayMs(response))
    }

    throw new Error("Brave search attempts exhausted")
  }

  private computeRetryDelayMs(response: Response): number {
    const retryAfter = response.headers.get("retry-after")
    if (retryAfter) {
      const parsedSeconds = Number.parseFloat(retryAfter)
      if (Number.isFinite(parsedSeconds) && parsedSeconds > 0) {
        return Math.ceil(parsedSeconds * 1000 + this.jitterMs())
      }
    }

    const reset = response.headers.get("x-ratelimit-reset")
    if (reset) {
      const parsedReset = Number.parseFloat(reset)
      if (Number.isFinite(parsedReset) && parsedReset > 0) {
        // Either delta seconds or an epoch timestamp.
        if (parsedReset > 1_000_000_000) {
          return Math.max(0, Math.ceil(parsedReset * 1000 - this.now() + this.jitterMs()))
        }
        return Math.ceil(parsedReset * 1000 + this.jitterMs())
      }
    }

    return 1000 + this.jitterMs()
  }

  private jitterMs(): number {
    return Math.floor(this.random() * 250)
  }
}
