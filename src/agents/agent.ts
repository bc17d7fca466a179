import type pino from "pino"
import { z } from "zod"
import type { AgentDetails, AgentResult, Flag, Severity } from "../types"

export type AgentRole = "analysis" | "verdict"

export interface AgentContext {
  /** Aborted when the agent times out or the request goes away. */
  signal: AbortSignal
  logger: pino.Logger
}

/**
 * A single, independent check over one validated request.
 *
 * Agents may call out to external services but must not share mutable state
 * or read each other's output. Whatever `run` resolves to is normalised by
 * {@link normalizeAgentResult} before it reaches the aggregator.
 */
export interface Agent<TRequest> {
  readonly name: string
  readonly role?: AgentRole
  /** Overrides the runner's per-agent timeout. */
  readonly timeoutMs?: number
  run(request: TRequest, context: AgentContext): Promise<AgentResult>
}

export class AgentContractError extends Error {
  constructor(
    readonly agent: string,
    readonly issues: string[],
  ) {
    super(`Agent '${agent}' returned a malformed result: ${issues.join("; ")}`)
    this.name = "AgentContractError"
  }
}

const FlagSchema = z.object({
  severity: z.enum(["critical", "warning", "info"]),
  message: z.string(),
})

const AgentResultSchema = z.object({
  flags: z.array(FlagSchema).default([]),
  details: z.record(z.unknown()).default({}),
  scoreImpact: z.number().finite(),
  verdictTitle: z.string().optional().transform(blankToUndefined),
  verdictMessage: z.string().optional().transform(blankToUndefined),
})

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function normalizeAgentResult(agent: string, raw: unknown): AgentResult {
  const parsed = AgentResultSchema.safeParse(raw)
  if (!parsed.success) {
    throw new AgentContractError(
      agent,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "result"}: ${issue.message}`),
    )
  }

  const result: AgentResult = {
    flags: parsed.data.flags.map((flag) => ({ severity: flag.severity, message: flag.message })),
    details: { ...parsed.data.details },
    scoreImpact: Math.max(0, Math.round(parsed.data.scoreImpact)),
  }

  if (parsed.data.verdictTitle !== undefined) {
    result.verdictTitle = parsed.data.verdictTitle
  }
  if (parsed.data.verdictMessage !== undefined) {
    result.verdictMessage = parsed.data.verdictMessage
  }

  return result
}

export function emptyAgentResult(): AgentResult {
  return { flags: [], details: {}, scoreImpact: 0 }
}

export function flag(severity: Severity, message: string): Flag {
  return { severity, message }
}

/**
 * Mutable accumulator agents use while scoring. Positive trust signals may
 * push `impact` below zero; the published deduction is floored at zero.
 */
export class Findings {
  readonly flags: Flag[] = []
  readonly details: AgentDetails = {}
  impact = 0

  add(severity: Severity, message: string, impact = 0): this {
    this.flags.push(flag(severity, message))
    this.impact += impact
    return this
  }

  adjust(impact: number): this {
    this.impact += impact
    return this
  }

  set(key: string, value: unknown): this {
    this.details[key] = value
    return this
  }

  finish(verdict?: { title?: string; message?: string }): AgentResult {
    const result: AgentResult = {
      flags: this.flags,
      details: this.details,
      scoreImpact: Math.max(0, this.impact),
    }
    if (verdict?.title) {
      result.verdictTitle = verdict.title
    }
    if (verdict?.message) {
      result.verdictMessage = verdict.message
    }
    return result
  }
}
