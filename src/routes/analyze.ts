import { errorResponse, isJsonObject, jsonResponse, readJsonBody } from "../lib/http"
import type { ServerContext } from "../server-context"
import { detectPlatform, RequestValidationError } from "../services/platform-router"
import type {
  AgentResult,
  AgentResultResponse,
  AggregateResult,
  AggregateResultResponse,
} from "../types"

export async function handleAnalyze(
  request: Request,
  ctx: ServerContext,
  platformParam?: string,
): Promise<Response> {
  const body = await readJsonBody(request)
  if (!isJsonObject(body)) {
    return errorResponse(400, "Request body must be a JSON object")
  }

  const platform = platformParam ?? resolveBodyPlatform(body)

  try {
    const result = await ctx.analysisService.analyze(platform, body, request.signal)
    return jsonResponse(toAggregateResponse(result))
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return errorResponse(400, error.message, error.issues)
    }
    throw error
  }
}

function resolveBodyPlatform(body: Record<string, unknown>): string {
  if (typeof body.platform === "string" && body.platform.trim()) {
    return body.platform
  }
  return detectPlatform(typeof body.url === "string" ? body.url : "")
}

export function toAgentResultResponse(result: AgentResult): AgentResultResponse {
  const response: AgentResultResponse = {
    flags: result.flags,
    details: result.details,
    score_impact: result.scoreImpact,
  }
  if (result.verdictTitle !== undefined) {
    response.verdict_title = result.verdictTitle
  }
  if (result.verdictMessage !== undefined) {
    response.verdict_message = result.verdictMessage
  }
  return response
}

export function toAggregateResponse(result: AggregateResult): AggregateResultResponse {
  return {
    platform: result.platform,
    score: result.score,
    risk_level: result.riskLevel,
    verdict_title: result.verdictTitle,
    verdict_message: result.verdictMessage,
    flags: result.flags,
    details: result.details,
    per_agent_outputs: Object.fromEntries(
      Object.entries(result.perAgentOutputs).map(([agent, output]) => [agent, toAgentResultResponse(output)]),
    ),
    failed_agents: result.failedAgents,
    analysis_performed: result.analysisPerformed,
    score_breakdown: {
      base_score: result.scoreBreakdown.baseScore,
      total_impact: result.scoreBreakdown.totalImpact,
      impacts: result.scoreBreakdown.impacts,
    },
  }
}
