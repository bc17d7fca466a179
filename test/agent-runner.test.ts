import { describe, expect, test } from "vitest"
import type { Agent } from "../src/agents/agent"
import { createSilentLoggers } from "../src/logger"
import { AgentRunner } from "../src/services/agent-runner"
import { Aggregator } from "../src/services/aggregator"
import type { AgentResult } from "../src/types"

const logger = createSilentLoggers().app

function agent(name: string, run: Agent<string>["run"], timeoutMs?: number): Agent<string> {
  return { name, run, timeoutMs }
}

function fixed(name: string, scoreImpact: number): Agent<string> {
  return agent(name, async () => ({ flags: [], details: {}, scoreImpact }))
}

function hanging(name: string): Agent<string> {
  return agent(
    name,
    (_request, { signal }) =>
      new Promise<AgentResult>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(signal.reason), { once: true })
      }),
  )
}

describe("agent runner", () => {
  test("substitutes a zero-impact default for an agent that times out", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 50, reportUnavailableAgents: true }, logger)
    const outcomes = await runner.runAll([fixed("a", 5), hanging("slow"), fixed("c", 5)], "req")

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["completed", "timed_out", "completed"])
    expect(outcomes[1]?.result).toEqual({
      flags: [{ severity: "info", message: "slow check unavailable" }],
      details: {},
      scoreImpact: 0,
    })
    expect(outcomes[1]?.error).toBe("Agent 'slow' timed out after 50ms")

    const aggregate = new Aggregator().aggregate({ platform: "storefront", outcomes })
    expect(aggregate.score).toBe(90)
    expect(aggregate.riskLevel).toBe("safe")
  })

  test("honours a per-agent timeout override", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 10_000, reportUnavailableAgents: false }, logger)
    const slow: Agent<string> = { ...hanging("slow"), timeoutMs: 20 }
    const [outcome] = await runner.runAll([slow], "req")

    expect(outcome?.status).toBe("timed_out")
    expect(outcome?.result.flags).toEqual([])
  })

  test("caps oversized timeouts instead of expiring at once", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 3_000_000_000, reportUnavailableAgents: true }, logger)
    const slowish = agent("slowish", async () => {
      await new Promise((resolve) => setTimeout(resolve, 30))
      return { flags: [], details: {}, scoreImpact: 3 }
    })
    const overridden: Agent<string> = { ...fixed("override", 4), timeoutMs: 5_000_000_000 }

    const outcomes = await runner.runAll([slowish, overridden], "req")

    expect(outcomes.map((outcome) => [outcome.status, outcome.result.scoreImpact])).toEqual([
      ["completed", 3],
      ["completed", 4],
    ])
  })

  test("absorbs thrown errors, including synchronous ones", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 1_000, reportUnavailableAgents: true }, logger)
    const outcomes = await runner.runAll(
      [
        agent("rejects", async () => {
          throw new Error("upstream 500")
        }),
        agent("throws", () => {
          throw new Error("boom")
        }),
      ],
      "req",
    )

    expect(outcomes.map((outcome) => [outcome.status, outcome.error])).toEqual([
      ["failed", "upstream 500"],
      ["failed", "boom"],
    ])
  })

  test("treats a malformed result as a failure", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 1_000, reportUnavailableAgents: false }, logger)
    const malformed: Agent<string> = {
      name: "broken",
      run: async () => JSON.parse('{"flags":[],"details":{},"scoreImpact":"lots"}'),
    }
    const [outcome] = await runner.runAll([malformed], "req")

    expect(outcome?.status).toBe("failed")
    expect(outcome?.result.scoreImpact).toBe(0)
    expect(outcome?.error).toContain("malformed result")
  })

  test("floors negative impacts and rounds fractional ones", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 1_000, reportUnavailableAgents: true }, logger)
    const outcomes = await runner.runAll([fixed("negative", -10), fixed("fractional", 4.6)], "req")

    expect(outcomes.map((outcome) => outcome.result.scoreImpact)).toEqual([0, 5])
  })

  test("hands each agent the same request and keeps declaration order", async () => {
    const seen: string[] = []
    const runner = new AgentRunner({ agentTimeoutMs: 1_000, reportUnavailableAgents: true }, logger)
    const outcomes = await runner.runAll(
      [
        agent("late", async (request) => {
          await new Promise((resolve) => setTimeout(resolve, 20))
          seen.push(`late:${request}`)
          return { flags: [], details: {}, scoreImpact: 1 }
        }),
        agent("early", async (request) => {
          seen.push(`early:${request}`)
          return { flags: [], details: {}, scoreImpact: 2 }
        }),
      ],
      "payload",
    )

    expect(seen).toEqual(["early:payload", "late:payload"])
    expect(outcomes.map((outcome) => outcome.agent)).toEqual(["late", "early"])
  })

  test("stops every agent when the caller aborts", async () => {
    const runner = new AgentRunner({ agentTimeoutMs: 10_000, reportUnavailableAgents: true }, logger)
    const controller = new AbortController()
    const pending = runner.runAll([hanging("a"), hanging("b")], "req", controller.signal)
    await new Promise((resolve) => setTimeout(resolve, 5))
    controller.abort(new Error("client went away"))

    const outcomes = await pending
    expect(outcomes.map((outcome) => [outcome.status, outcome.error])).toEqual([
      ["failed", "client went away"],
      ["failed", "client went away"],
    ])
  })

  test("reports durations from the injected clock", async () => {
    let tick = 0
    const runner = new AgentRunner(
      { agentTimeoutMs: 1_000, reportUnavailableAgents: true },
      logger,
      { now: () => (tick += 7) },
    )
    const [outcome] = await runner.runAll([fixed("a", 0)], "req")

    expect(outcome?.durationMs).toBe(7)
  })
})
