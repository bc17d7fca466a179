import { isLlmConfigured } from "../config"
import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleReadyz(_request: Request, ctx: ServerContext): Response {
  const { config } = ctx
  const searchEnabled = config.search.strategy !== "disabled"
  const braveRequired =
    searchEnabled && (config.search.primary === "brave" || config.search.strategy === "fallback")
  const searxngRequired =
    searchEnabled && (config.search.primary === "searxng" || config.search.strategy === "fallback")

  const llmConfigured = isLlmConfigured(config.llm)
  const ollamaBaseUrlValid = config.llm.provider !== "ollama" || isValidUrl(config.llm.ollamaBaseUrl)
  const braveApiKeyConfigured = !braveRequired || Boolean(config.brave.apiKey)
  const searxngBaseUrlConfigured = !searxngRequired || Boolean(config.searxng.baseUrl)
  const searxngBaseUrlValid = !searxngRequired || isValidUrl(config.searxng.baseUrl)

  const checks = {
    llm_provider: config.llm.provider,
    llm_configured: llmConfigured,
    ollama_base_url_valid: ollamaBaseUrlValid,
    search_strategy: config.search.strategy,
    search_primary: config.search.primary,
    search_enabled: searchEnabled,
    brave_required: braveRequired,
    brave_api_key_configured: braveApiKeyConfigured,
    searxng_required: searxngRequired,
    searxng_base_url_configured: searxngBaseUrlConfigured,
    searxng_base_url_valid: searxngBaseUrlValid,
  }

  const ready =
    llmConfigured &&
    ollamaBaseUrlValid &&
    braveApiKeyConfigured &&
    searxngBaseUrlConfigured &&
    searxngBaseUrlValid

  return jsonResponse(
    {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
      checks,
    },
    ready ? 200 : 503,
  )
}

function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
