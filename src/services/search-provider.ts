export type SearchProviderName = "brave" | "searxng"

export interface SearchRequest {
  query: string
  count: number
  signal?: AbortSignal
}

export interface SearchResult {
  url: string
  title: string
  snippet: string
  source: string
  published?: string
}

/** One web search backend. Resolves to at most `request.count` results. */
export interface SearchProviderClient {
  readonly name: SearchProviderName
  search(request: SearchRequest): Promise<SearchResult[]>
}

export type FetchLike = (input: Request | URL | string, init?: RequestInit) => Promise<Response>

export function safeHostname(url: string): string {
  try {
    return new URL(url).hostname
  } catch {
    return "unknown"
  }
}
