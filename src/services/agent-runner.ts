import type pino from "pino"
import { AgentContractError, emptyAgentResult, flag, normalizeAgentResult } from "../agents/agent"
import type { Agent } from "../agents/agent"
import { MAX_TIMER_MS } from "../config"
import type { RunnerSettings } from "../config"
import type { AgentOutcome, AgentResult } from "../types"

export class AgentExecutionError extends Error {
  constructor(
    readonly agent: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause })
    this.name = "AgentExecutionError"
  }
}

export class AgentTimeoutError extends AgentExecutionError {
  constructor(
    agent: string,
    readonly timeoutMs: number,
  ) {
    super(agent, `Agent '${agent}' timed out after ${timeoutMs}ms`)
    this.name = "AgentTimeoutError"
  }
}

interface AgentRunnerDependencies {
  now?: () => number
}

export class AgentRunner {
  private readonly now: () => number

  constructor(
    private readonly settings: RunnerSettings,
    private readonly logger: pino.Logger,
    dependencies: AgentRunnerDependencies = {},
  ) {
    this.now = dependencies.now ?? Date.now
  }

  /**
   * Runs every agent concurrently and resolves once each one has completed,
   * failed or timed out. Never rejects. Outcomes follow the order of `agents`.
   */
  async runAll<TRequest>(
    agents: readonly Agent<TRequest>[],
    request: TRequest,
    signal?: AbortSignal,
  ): Promise<AgentOutcome[]> {
    const runs = agents.map((agent) => ({ agent, controller: new AbortController() }))
    const controllers = runs.map((run) => run.controller)
    const detach = linkAbort(signal, controllers)

    try {
      return await Promise.all(runs.map((run) => this.runOne(run.agent, request, run.controller)))
    } finally {
      detach()
      // Anything still in flight (late I/O of a timed-out agent) is cancelled here.
      for (const controller of controllers) {
        controller.abort()
      }
    }
  }

  private async runOne<TRequest>(
    agent: Agent<TRequest>,
    request: TRequest,
    controller: AbortController,
  ): Promise<AgentOutcome> {
    const started = this.now()
    const timeoutMs = Math.min(Math.max(1, agent.timeoutMs ?? this.settings.agentTimeoutMs), MAX_TIMER_MS)
    const logger = this.logger.child({ agent: agent.name })

    try {
      const raw = await withTimeout(
        agent.name,
        timeoutMs,
        controller,
        () => agent.run(request, { signal: controller.signal, logger }),
      )
      const result = normalizeAgentResult(agent.name, raw)

      return {
        agent: agent.name,
        status: "completed",
        result,
        durationMs: this.now() - started,
      }
    } catch (error) {
      const timedOut = error instanceof AgentTimeoutError
      const durationMs = this.now() - started
      const message = describeError(error)

      logger.warn(
        {
          error,
          durationMs,
          timedOut,
          contractViolation: error instanceof AgentContractError,
        },
        "agent failed; using zero-impact default",
      )

      return {
        agent: agent.name,
        status: timedOut ? "timed_out" : "failed",
        result: this.defaultResult(agent.name),
        durationMs,
        error: message,
      }
    }
  }

  private defaultResult(agentName: string): AgentResult {
    const result = emptyAgentResult()
    if (this.settings.reportUnavailableAgents) {
      result.flags.push(flag("info", `${agentName} check unavailable`))
    }
    return result
  }
}

async function withTimeout<T>(
  agentName: string,
  timeoutMs: number,
  controller: AbortController,
  task: () => Promise<T>,
): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new AgentTimeoutError(agentName, timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    // A synchronous throw inside `run` is turned into a rejection here.
    return await Promise.race([Promise.resolve().then(task), timeout])
  } catch (error) {
    if (error instanceof AgentExecutionError || error instanceof AgentContractError) {
      throw error
    }
    throw new AgentExecutionError(agentName, describeError(error), error)
  } finally {
    clearTimeout(timeoutHandle)
  }
}

function linkAbort(signal: AbortSignal | undefined, controllers: AbortController[]): () => void {
  if (!signal) {
    return () => {}
  }

  const abortAll = () => {
    for (const controller of controllers) {
      controller.abort(signal.reason)
    }
  }

  if (signal.aborted) {
    abortAll()
    return () => {}
  }

  signal.addEventListener("abort", abortAll, { once: true })
  return () => signal.removeEventListener("abort", abortAll)
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
