import type { z } from "zod"
import type { Agent } from "../agents/agent"
import type { AgentOutcome } from "../types"
import type { AgentRunner } from "./agent-runner"

export class RequestValidationError extends Error {
  constructor(
    readonly platform: string,
    readonly issues: z.typeToFlattenedError<unknown>,
  ) {
    super(`Invalid ${platform} request`)
    this.name = "RequestValidationError"
  }
}

export class DuplicateAgentError extends Error {
  constructor(
    readonly platform: string,
    readonly agent: string,
  ) {
    super(`Agent '${agent}' is registered twice for platform '${platform}'`)
    this.name = "DuplicateAgentError"
  }
}

export interface PlatformRoute<TRequest> {
  platform: string
  aliases?: readonly string[]
  schema: z.ZodType<TRequest, z.ZodTypeDef, unknown>
  agents: readonly Agent<TRequest>[]
}

export interface PlatformPlan {
  platform: string
  agentNames: string[]
  verdictAgent?: string
  execute(runner: AgentRunner, signal?: AbortSignal): Promise<AgentOutcome[]>
}

export interface PlatformSummary {
  platform: string
  aliases: string[]
  agents: string[]
  verdictAgent?: string
}

interface RegisteredRoute {
  summary: PlatformSummary
  plan(payload: unknown): PlatformPlan
}

export class PlatformRouter {
  private readonly routes = new Map<string, RegisteredRoute>()
  private readonly aliases = new Map<string, string>()

  register<TRequest>(route: PlatformRoute<TRequest>): this {
    const platform = normalizePlatform(route.platform)
    const agents = [...route.agents]
    const seen = new Set<string>()
    for (const agent of agents) {
      if (seen.has(agent.name)) {
        throw new DuplicateAgentError(platform, agent.name)
      }
      seen.add(agent.name)
    }

    const verdictAgent = agents.find((agent) => agent.role === "verdict")?.name
    const summary: PlatformSummary = {
      platform,
      aliases: (route.aliases ?? []).map(normalizePlatform),
      agents: agents.map((agent) => agent.name),
      verdictAgent,
    }

    this.routes.set(platform, {
      summary,
      plan: (payload) => {
        const parsed = route.schema.safeParse(payload)
        if (!parsed.success) {
          throw new RequestValidationError(platform, parsed.error.flatten())
        }

        const request = deepFreeze(parsed.data)
        return {
          platform,
          agentNames: summary.agents,
          verdictAgent,
          execute: (runner, signal) => runner.runAll(agents, request, signal),
        }
      },
    })

    for (const alias of summary.aliases) {
      this.aliases.set(alias, platform)
    }

    return this
  }

  resolve(platform: string): string | null {
    const normalized = normalizePlatform(platform)
    if (this.routes.has(normalized)) {
      return normalized
    }
    return this.aliases.get(normalized) ?? null
  }

  /**
   * Validates `payload` against the platform's schema. Returns `null` for an
   * unknown platform; throws {@link RequestValidationError} for a bad payload.
   */
  plan(platform: string, payload: unknown): PlatformPlan | null {
    const resolved = this.resolve(platform)
    if (!resolved) {
      return null
    }

    const route = this.routes.get(resolved)
    return route ? route.plan(payload) : null
  }

  list(): PlatformSummary[] {
    return [...this.routes.values()].map((route) => ({
      ...route.summary,
      aliases: [...route.summary.aliases],
      agents: [...route.summary.agents],
    }))
  }
}

export function normalizePlatform(platform: string): string {
  return platform.trim().toLowerCase().replace(/[\s-]+/g, "_")
}

export const STOREFRONT_PLATFORM = "storefront"
export const MARKETPLACE_PLATFORM = "facebook_marketplace"

/** Best guess for collectors that do not say which platform they scraped. */
export function detectPlatform(url: string): string {
  try {
    const parsed = new URL(url)
    const host = parsed.hostname.toLowerCase()
    const isFacebook = host === "facebook.com" || host.endsWith(".facebook.com")
    if (isFacebook && parsed.pathname.toLowerCase().startsWith("/marketplace")) {
      return MARKETPLACE_PLATFORM
    }
  } catch {
    return STOREFRONT_PLATFORM
  }

  return STOREFRONT_PLATFORM
}

// Every agent shares the same request object, nested lists included.
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    const children: unknown[] = Object.values(value)
    for (const child of children) {
      deepFreeze(child)
    }
  }
  return value
}
