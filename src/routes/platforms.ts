import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handlePlatforms(_request: Request, ctx: ServerContext): Response {
  return jsonResponse({
    platforms: ctx.analysisService.router.list().map((platform) => ({
      platform: platform.platform,
      aliases: platform.aliases,
      agents: platform.agents,
      verdict_agent: platform.verdictAgent ?? null,
    })),
  })
}
