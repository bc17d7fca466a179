import type { SearchSettings } from "../config"
import type { SearchProviderClient, SearchProviderName, SearchRequest, SearchResult } from "./search-provider"

export interface SearchExecution {
  /** Provider that produced the results. */
  provider: SearchProviderName
  results: SearchResult[]
}

/** What agents see of web search. */
export interface WebSearch {
  readonly enabled: boolean
  search(request: SearchRequest): Promise<SearchExecution>
}

export class SearchDisabledError extends Error {
  constructor() {
    super("Search is disabled")
    this.name = "SearchDisabledError"
  }
}

export class SearchProviderNotConfiguredError extends Error {
  constructor(readonly provider: SearchProviderName) {
    super(`Search provider '${provider}' is not configured`)
    this.name = "SearchProviderNotConfiguredError"
  }
}

export interface SearchProviderFailure {
  provider: SearchProviderName
  error: unknown
}

export class SearchFallbackError extends Error {
  constructor(readonly failures: SearchProviderFailure[]) {
    super(`Search failed on every provider: ${failures.map(describeFailure).join("; ")}`)
    this.name = "SearchFallbackError"
  }
}

export type SearchProviders = Partial<Record<SearchProviderName, SearchProviderClient>>

/**
 * Routes agent searches to the configured providers. In fallback mode the
 * other provider is tried once when the primary fails, unless the caller has
 * already given up.
 */
export class SearchOrchestrator implements WebSearch {
  private readonly chain: SearchProviderName[]

  constructor(
    settings: SearchSettings,
    private readonly providers: SearchProviders,
  ) {
    this.chain = providerChain(settings)
  }

  get enabled(): boolean {
    return this.chain.length > 0
  }

  async search(request: SearchRequest): Promise<SearchExecution> {
    if (this.chain.length === 0) {
      throw new SearchDisabledError()
    }

    const failures: SearchProviderFailure[] = []
    for (const provider of this.chain) {
      try {
        const results = await this.client(provider).search(request)
        return { provider, results }
      } catch (error) {
        // A cancelled request is not a provider failure.
        request.signal?.throwIfAborted()
        failures.push({ provider, error })
      }
    }

    const [first] = failures
    if (failures.length === 1 && first) {
      throw first.error
    }
    throw new SearchFallbackError(failures)
  }

  private client(provider: SearchProviderName): SearchProviderClient {
    const client = this.providers[provider]
    if (!client) {
      throw new SearchProviderNotConfiguredError(provider)
    }
    return client
  }
}

export function providerChain(settings: SearchSettings): SearchProviderName[] {
  switch (settings.strategy) {
    case "disabled":
      return []
    case "single":
      return [settings.primary]
    case "fallback":
      return [settings.primary, settings.primary === "brave" ? "searxng" : "brave"]
  }
}

function describeFailure(failure: SearchProviderFailure): string {
  const message = failure.error instanceof Error ? failure.error.message : String(failure.error)
  return `${failure.provider} (${message})`
}
