import type {
  AgentDetails,
  AgentOutcome,
  AgentResult,
  AggregateResult,
  Flag,
  RiskLevel,
} from "../types"

export interface ScoringSettings {
  baseScore: number
  /** Lowest score still reported as safe. */
  safeMinScore: number
  /** Lowest score still reported as suspicious; anything below is dangerous. */
  suspiciousMinScore: number
}

export const DEFAULT_SCORING: Readonly<ScoringSettings> = Object.freeze({
  baseScore: 100,
  safeMinScore: 80,
  suspiciousMinScore: 50,
})

export interface AggregateInput {
  platform: string
  outcomes: readonly AgentOutcome[]
  /** Name of the agent whose verdict text wins, if the platform designates one. */
  verdictAgent?: string
}

const GENERIC_VERDICTS: Record<RiskLevel, { title: string; message: string }> = {
  safe: {
    title: "All clear: go ahead and shop.",
    message: "No significant risks were found. Review the details below before paying.",
  },
  suspicious: {
    title: "Something smells off. Check these details.",
    message: "Some signals call for caution. Review the flags below before you buy.",
  },
  dangerous: {
    title: "Red alert: keep your card away from this one.",
    message: "Several strong scam or security signals were found. Avoid completing this purchase.",
  },
}

const NOT_ANALYZED_VERDICT = {
  title: "No analysis performed",
  message: "This platform is not supported yet, so no checks were run.",
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value))
}

export function riskLevelForScore(
  score: number,
  settings: ScoringSettings = DEFAULT_SCORING,
): RiskLevel {
  if (score >= settings.safeMinScore) {
    return "safe"
  }
  if (score >= settings.suspiciousMinScore) {
    return "suspicious"
  }
  return "dangerous"
}

export function genericVerdict(level: RiskLevel): { title: string; message: string } {
  return GENERIC_VERDICTS[level]
}

export class Aggregator {
  constructor(private readonly settings: ScoringSettings = DEFAULT_SCORING) {}

  aggregate(input: AggregateInput): AggregateResult {
    const { outcomes } = input
    const impacts: Record<string, number> = {}
    const perAgentOutputs: Record<string, AgentResult> = {}
    const details: Record<string, AgentDetails> = {}
    const flags: Flag[] = []
    const failedAgents: string[] = []
    let totalImpact = 0

    for (const outcome of outcomes) {
      const result = outcome.result
      totalImpact += result.scoreImpact
      impacts[outcome.agent] = result.scoreImpact
      perAgentOutputs[outcome.agent] = copyResult(result)

      for (const item of result.flags) {
        flags.push({ ...item })
      }

      if (Object.keys(result.details).length > 0) {
        details[outcome.agent] = { ...result.details }
      }

      if (outcome.status !== "completed") {
        failedAgents.push(outcome.agent)
      }
    }

    const score = clampScore(this.settings.baseScore - totalImpact)
    const riskLevel = riskLevelForScore(score, this.settings)
    const analysisPerformed = outcomes.length > 0
    const verdict = analysisPerformed
      ? this.resolveVerdict(riskLevel, input)
      : NOT_ANALYZED_VERDICT

    return {
      platform: input.platform,
      score,
      riskLevel,
      verdictTitle: verdict.title,
      verdictMessage: verdict.message,
      flags,
      details,
      perAgentOutputs,
      failedAgents,
      analysisPerformed,
      scoreBreakdown: {
        baseScore: this.settings.baseScore,
        totalImpact,
        impacts,
      },
    }
  }

  private resolveVerdict(
    riskLevel: RiskLevel,
    input: AggregateInput,
  ): { title: string; message: string } {
    const fallback = genericVerdict(riskLevel)
    if (!input.verdictAgent) {
      return fallback
    }

    const outcome = input.outcomes.find((item) => item.agent === input.verdictAgent)
    if (!outcome || outcome.status !== "completed") {
      return fallback
    }

    return {
      title: outcome.result.verdictTitle ?? fallback.title,
      message: outcome.result.verdictMessage ?? fallback.message,
    }
  }
}

function copyResult(result: AgentResult): AgentResult {
  const copy: AgentResult = {
    flags: result.flags.map((item) => ({ ...item })),
    details: { ...result.details },
    scoreImpact: result.scoreImpact,
  }
  if (result.verdictTitle !== undefined) {
    copy.verdictTitle = result.verdictTitle
  }
  if (result.verdictMessage !== undefined) {
    copy.verdictMessage = result.verdictMessage
  }
  return copy
}
