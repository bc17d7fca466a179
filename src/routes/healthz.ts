import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleHealthz(_request: Request, ctx: ServerContext): Response {
  return jsonResponse({
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      llm_enabled: ctx.llm.enabled,
      llm_provider: ctx.config.llm.provider,
      search_enabled: ctx.search.enabled,
      platforms: ctx.analysisService.router.list().map((platform) => platform.platform),
    },
  })
}
