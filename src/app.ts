import type { AppConfig } from "./config"
import { errorResponse, preflightResponse, withCors } from "./lib/http"
import type { Loggers } from "./logger"
import { createPlatformRouter } from "./platforms"
import { handleAnalyze } from "./routes/analyze"
import { handleHealthz } from "./routes/healthz"
import { handlePlatforms } from "./routes/platforms"
import { handleReadyz } from "./routes/readyz"
import type { ServerContext } from "./server-context"
import { AgentRunner } from "./services/agent-runner"
import { Aggregator } from "./services/aggregator"
import { AnalysisService } from "./services/analysis-service"
import { BraveClient } from "./services/brave-client"
import { LlmClient } from "./services/llm-client"
import type { StructuredLlm } from "./services/llm-client"
import { SearchOrchestrator } from "./services/search-orchestrator"
import type { WebSearch } from "./services/search-orchestrator"
import { SearxngClient } from "./services/searxng-client"

interface ServerContextOverrides {
  llm?: StructuredLlm
  search?: WebSearch
  now?: () => Date
}

export function createServerContext(
  config: AppConfig,
  loggers: Loggers,
  overrides: ServerContextOverrides = {},
): ServerContext {
  const llm = overrides.llm ?? new LlmClient(config.llm, loggers.app.child({ component: "llm" }))
  const search =
    overrides.search ??
    new SearchOrchestrator(config.search, {
      brave: config.brave.apiKey ? new BraveClient(config.brave) : undefined,
      searxng: config.searxng.baseUrl ? new SearxngClient(config.searxng) : undefined,
    })

  const router = createPlatformRouter({
    llm,
    search,
    priceComparison: config.priceComparison,
    now: overrides.now,
  })

  const analysisService = new AnalysisService({
    router,
    runner: new AgentRunner(config.runner, loggers.app.child({ component: "runner" })),
    aggregator: new Aggregator(),
    audit: loggers.audit,
  })

  return { config, loggers, analysisService, llm, search }
}

const ANALYZE_WITH_PLATFORM = /^\/v1\/analyze\/([^/]+)\/?$/

export function createRequestHandler(ctx: ServerContext): (request: Request) => Promise<Response> {
  return async (request) => {
    const started = Date.now()
    const { pathname } = new URL(request.url)

    let response: Response
    try {
      response = await route(request, pathname, ctx)
    } catch (error) {
      ctx.loggers.app.error({ error, method: request.method, pathname }, "unhandled request error")
      response = errorResponse(500, "Internal server error")
    }

    ctx.loggers.app.info(
      {
        method: request.method,
        pathname,
        status: response.status,
        durationMs: Date.now() - started,
      },
      "http request",
    )

    return withCors(response, ctx.config.corsOrigin)
  }
}

async function route(request: Request, pathname: string, ctx: ServerContext): Promise<Response> {
  if (request.method === "OPTIONS") {
    return preflightResponse()
  }

  if (pathname === "/healthz") {
    return request.method === "GET" ? handleHealthz(request, ctx) : methodNotAllowed()
  }

  if (pathname === "/readyz") {
    return request.method === "GET" ? handleReadyz(request, ctx) : methodNotAllowed()
  }

  if (pathname === "/v1/platforms") {
    return request.method === "GET" ? handlePlatforms(request, ctx) : methodNotAllowed()
  }

  if (pathname === "/v1/analyze") {
    return request.method === "POST" ? handleAnalyze(request, ctx) : methodNotAllowed()
  }

  const match = ANALYZE_WITH_PLATFORM.exec(pathname)
  if (match?.[1]) {
    if (request.method !== "POST") {
      return methodNotAllowed()
    }
    const platform = decodePathSegment(match[1])
    if (platform === null) {
      return errorResponse(400, "Invalid platform in path")
    }
    return handleAnalyze(request, ctx, platform)
  }

  return errorResponse(404, "Route not found")
}

function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment)
  } catch {
    return null
  }
}

function methodNotAllowed(): Response {
  return errorResponse(405, "Method not allowed")
}
