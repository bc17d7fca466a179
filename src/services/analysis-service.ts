import type pino from "pino"
import type { AggregateResult } from "../types"
import type { AgentRunner } from "./agent-runner"
import type { Aggregator } from "./aggregator"
import type { PlatformRouter } from "./platform-router"
import { normalizePlatform } from "./platform-router"

interface AnalysisServiceDependencies {
  router: PlatformRouter
  runner: AgentRunner
  aggregator: Aggregator
  audit: pino.Logger
  now?: () => number
}

export class AnalysisService {
  private readonly now: () => number

  constructor(private readonly dependencies: AnalysisServiceDependencies) {
    this.now = dependencies.now ?? Date.now
  }

  get router(): PlatformRouter {
    return this.dependencies.router
  }

  /**
   * Validates the payload for `platform`, fans out to the platform's agents and
   * merges their results. Only a payload that fails validation rejects
   * (with `RequestValidationError`); agent failures are absorbed.
   */
  async analyze(platform: string, payload: unknown, signal?: AbortSignal): Promise<AggregateResult> {
    const started = this.now()
    const { router, runner, aggregator, audit } = this.dependencies
    const plan = router.plan(platform, payload)

    if (!plan) {
      const result = aggregator.aggregate({ platform: normalizePlatform(platform), outcomes: [] })
      audit.info(
        {
          platform: result.platform,
          analysisPerformed: false,
          durationMs: this.now() - started,
        },
        "platform not supported; no agents run",
      )
      return result
    }

    const outcomes = await plan.execute(runner, signal)
    const result = aggregator.aggregate({
      platform: plan.platform,
      outcomes,
      verdictAgent: plan.verdictAgent,
    })

    audit.info(
      {
        platform: result.platform,
        score: result.score,
        riskLevel: result.riskLevel,
        flagCount: result.flags.length,
        failedAgents: result.failedAgents,
        agentDurationsMs: Object.fromEntries(outcomes.map((outcome) => [outcome.agent, outcome.durationMs])),
        durationMs: this.now() - started,
      },
      "analysis completed",
    )

    return result
  }
}
