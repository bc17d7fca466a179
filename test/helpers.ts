import { createSilentLoggers } from "../src/logger"
import type { AgentContext } from "../src/agents/agent"
import type { StructuredLlm, StructuredLlmRequest } from "../src/services/llm-client"
import { LlmUnavailableError } from "../src/services/llm-client"
import type { SearchExecution, WebSearch } from "../src/services/search-orchestrator"
import { SearchDisabledError } from "../src/services/search-orchestrator"
import type { SearchRequest, SearchResult } from "../src/services/search-provider"
import type { AgentOutcome, AgentResult } from "../src/types"

export function agentContext(): AgentContext {
  return {
    signal: new AbortController().signal,
    logger: createSilentLoggers().app,
  }
}

export function completed(agent: string, result: Partial<AgentResult> = {}): AgentOutcome {
  return {
    agent,
    status: "completed",
    durationMs: 1,
    result: { flags: [], details: {}, scoreImpact: 0, ...result },
  }
}

/** Answers each structured call with the next queued value, or with `respond`. */
export class FakeLlm implements StructuredLlm {
  readonly calls: StructuredLlmRequest<unknown>[] = []
  private readonly queued: unknown[]

  constructor(
    readonly enabled = true,
    queued: unknown[] = [],
    private readonly respond?: (request: StructuredLlmRequest<unknown>) => unknown,
  ) {
    this.queued = [...queued]
  }

  async generate<T>(request: StructuredLlmRequest<T>): Promise<T> {
    this.calls.push(request)
    if (!this.enabled) {
      throw new LlmUnavailableError("LLM provider is not configured")
    }

    const next = this.queued.length > 0 ? this.queued.shift() : this.respond?.(request)
    if (next instanceof Error) {
      throw next
    }
    return request.schema.parse(next)
  }
}

export class FakeSearch implements WebSearch {
  readonly calls: SearchRequest[] = []

  constructor(
    readonly enabled = true,
    private readonly respond: (request: SearchRequest) => SearchResult[] | Error = () => [],
  ) {}

  async search(request: SearchRequest): Promise<SearchExecution> {
    this.calls.push(request)
    if (!this.enabled) {
      throw new SearchDisabledError()
    }
    const results = this.respond(request)
    if (results instanceof Error) {
      throw results
    }
    return { provider: "brave", results }
  }
}

export function result(url: string, title: string, snippet: string): SearchResult {
  return { title, url, snippet, source: "test" }
}
