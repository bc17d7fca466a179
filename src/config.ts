import { z } from "zod"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"
export type LlmProviderName = "openai" | "ollama"
export type SearchStrategy = "disabled" | "single" | "fallback"
export type SearchProviderPreference = "brave" | "searxng"
export type BraveRateLimitTier = "free" | "paid" | "base" | "pro"

export interface RunnerSettings {
  agentTimeoutMs: number
  reportUnavailableAgents: boolean
}

export interface LlmSettings {
  provider: LlmProviderName
  model: string
  visionModel: string
  openaiApiKey: string
  ollamaBaseUrl: string
  maxConcurrency: number
  cacheSize: number
}

export interface SearchSettings {
  strategy: SearchStrategy
  primary: SearchProviderPreference
}

export interface BraveSettings {
  apiKey: string
  baseUrl: string
  tier: BraveRateLimitTier | "custom"
  requestsPerSecond: number
  queueMax: number
  retryOn429: boolean
  retryMax: number
}

export interface SearxngSettings {
  baseUrl: string
  timeoutMs: number
}

export interface PriceComparisonSettings {
  region: string
  installmentFloor: number
}

export interface AppConfig {
  port: number
  host: string
  corsOrigin: string
  logDir: string
  logLevel: LogLevel
  runner: RunnerSettings
  llm: LlmSettings
  search: SearchSettings
  brave: BraveSettings
  searxng: SearxngSettings
  priceComparison: PriceComparisonSettings
}

const braveTierRps: Record<BraveRateLimitTier, number> = {
  free: 1,
  paid: 20,
  base: 20,
  pro: 50,
}

const RateLimitTierSchema = z.enum(["free", "paid", "base", "pro"])
const RateLimitSettingSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value
    }

    const normalized = value.trim().toLowerCase()
    if (/^\d+$/.test(normalized)) {
      return Number.parseInt(normalized, 10)
    }

    return normalized
  },
  z.union([RateLimitTierSchema, z.number().int().positive()]),
)

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  SHOPWARDEN_CORS_ORIGIN: z.string().default("*"),
  SHOPWARDEN_LOG_DIR: z.string().default("./data/logs"),
  SHOPWARDEN_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SHOPWARDEN_AGENT_TIMEOUT_MS: z.string().optional(),
  SHOPWARDEN_REPORT_UNAVAILABLE_AGENTS: z.string().optional(),
  SHOPWARDEN_LLM_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  SHOPWARDEN_LLM_MODEL: z.string().default("gpt-4o-mini"),
  SHOPWARDEN_LLM_VISION_MODEL: z.string().optional(),
  SHOPWARDEN_OPENAI_API_KEY: z.string().default(""),
  SHOPWARDEN_OLLAMA_BASE_URL: z.string().default("http://localhost:11434/api"),
  SHOPWARDEN_LLM_MAX_CONCURRENCY: z.string().optional(),
  SHOPWARDEN_LLM_CACHE_SIZE: z.string().optional(),
  SHOPWARDEN_SEARCH_STRATEGY: z.enum(["disabled", "single", "fallback"]).default("single"),
  SHOPWARDEN_SEARCH_PRIMARY: z.enum(["brave", "searxng"]).default("brave"),
  SHOPWARDEN_BRAVE_API_KEY: z.string().default(""),
  SHOPWARDEN_BRAVE_API_BASE_URL: z.string().default("https://api.search.brave.com/res/v1"),
  SHOPWARDEN_BRAVE_RATE_LIMIT: RateLimitSettingSchema.default("free"),
  SHOPWARDEN_BRAVE_QUEUE_MAX: z.string().optional(),
  SHOPWARDEN_BRAVE_RETRY_ON_429: z.string().optional(),
  SHOPWARDEN_BRAVE_RETRY_MAX: z.string().optional(),
  SHOPWARDEN_SEARXNG_BASE_URL: z.string().default(""),
  SHOPWARDEN_SEARXNG_TIMEOUT_MS: z.string().optional(),
  SHOPWARDEN_PRICE_REGION: z.string().default(""),
  SHOPWARDEN_PRICE_INSTALLMENT_FLOOR: z.string().optional(),
})

/** Largest delay `setTimeout` accepts; anything above fires immediately. */
export const MAX_TIMER_MS = 2_147_483_647

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function toIntegerInRange(input: string | undefined, defaultValue: number, min: number, max: number): number {
  return Math.min(toMinInteger(input, defaultValue, min), max)
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const rateLimit = parsed.SHOPWARDEN_BRAVE_RATE_LIMIT
  const braveRate =
    typeof rateLimit === "number"
      ? { tier: "custom" as const, requestsPerSecond: rateLimit }
      : { tier: rateLimit, requestsPerSecond: braveTierRps[rateLimit] }

  return {
    port: toInteger(parsed.PORT, 3000),
    host: parsed.HOST ?? "0.0.0.0",
    corsOrigin: parsed.SHOPWARDEN_CORS_ORIGIN,
    logDir: parsed.SHOPWARDEN_LOG_DIR,
    logLevel: parsed.SHOPWARDEN_LOG_LEVEL,
    runner: {
      agentTimeoutMs: toIntegerInRange(parsed.SHOPWARDEN_AGENT_TIMEOUT_MS, 30_000, 100, MAX_TIMER_MS),
      reportUnavailableAgents: toBoolean(parsed.SHOPWARDEN_REPORT_UNAVAILABLE_AGENTS, true),
    },
    llm: {
      provider: parsed.SHOPWARDEN_LLM_PROVIDER,
      model: parsed.SHOPWARDEN_LLM_MODEL,
      visionModel: parsed.SHOPWARDEN_LLM_VISION_MODEL?.trim() || parsed.SHOPWARDEN_LLM_MODEL,
      openaiApiKey: parsed.SHOPWARDEN_OPENAI_API_KEY,
      ollamaBaseUrl: parsed.SHOPWARDEN_OLLAMA_BASE_URL,
      maxConcurrency: toMinInteger(parsed.SHOPWARDEN_LLM_MAX_CONCURRENCY, 4, 1),
      cacheSize: toMinInteger(parsed.SHOPWARDEN_LLM_CACHE_SIZE, 200, 0),
    },
    search: {
      strategy: parsed.SHOPWARDEN_SEARCH_STRATEGY,
      primary: parsed.SHOPWARDEN_SEARCH_PRIMARY,
    },
    brave: {
      apiKey: parsed.SHOPWARDEN_BRAVE_API_KEY,
      baseUrl: parsed.SHOPWARDEN_BRAVE_API_BASE_URL.replace(/\/+$/, ""),
      tier: braveRate.tier,
      requestsPerSecond: braveRate.requestsPerSecond,
      queueMax: toMinInteger(parsed.SHOPWARDEN_BRAVE_QUEUE_MAX, 10, 1),
      retryOn429: toBoolean(parsed.SHOPWARDEN_BRAVE_RETRY_ON_429, true),
      retryMax: toMinInteger(parsed.SHOPWARDEN_BRAVE_RETRY_MAX, 1, 0),
    },
    searxng: {
      baseUrl: parsed.SHOPWARDEN_SEARXNG_BASE_URL.trim().replace(/\/+$/, ""),
      timeoutMs: toIntegerInRange(parsed.SHOPWARDEN_SEARXNG_TIMEOUT_MS, 8_000, 100, MAX_TIMER_MS),
    },
    priceComparison: {
      region: parsed.SHOPWARDEN_PRICE_REGION.trim(),
      installmentFloor: toMinInteger(parsed.SHOPWARDEN_PRICE_INSTALLMENT_FLOOR, 50_000, 0),
    },
  }
}

export function isLlmConfigured(settings: LlmSettings): boolean {
  if (settings.provider === "ollama") {
    return Boolean(settings.ollamaBaseUrl)
  }

  return Boolean(settings.openaiApiKey)
}
