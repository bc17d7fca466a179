import pino from "pino"
import { describe, expect, test } from "vitest"
import { z } from "zod"
import { AgentRunner } from "../src/services/agent-runner"
import { Aggregator } from "../src/services/aggregator"
import { AnalysisService } from "../src/services/analysis-service"
import { PlatformRouter, RequestValidationError } from "../src/services/platform-router"

function captureLogger(lines: Record<string, unknown>[]): pino.Logger {
  return pino(
    { level: "info", base: null, timestamp: false },
    {
      write(line: string) {
        lines.push(JSON.parse(line))
      },
    },
  )
}

function buildService(lines: Record<string, unknown>[]): AnalysisService {
  const router = new PlatformRouter().register({
    platform: "storefront",
    schema: z.object({ url: z.string() }),
    agents: [
      {
        name: "judge",
        role: "verdict",
        run: async () => ({
          flags: [{ severity: "critical", message: "fake checkout" }],
          details: { checked: true },
          scoreImpact: 60,
          verdictTitle: "Fake checkout",
          verdictMessage: "The payment form posts to another site.",
        }),
      },
      {
        name: "failing",
        run: async () => {
          throw new Error("offline")
        },
      },
    ],
  })

  return new AnalysisService({
    router,
    runner: new AgentRunner({ agentTimeoutMs: 1_000, reportUnavailableAgents: true }, pino({ level: "silent" })),
    aggregator: new Aggregator(),
    audit: captureLogger(lines),
    now: () => 0,
  })
}

describe("analysis service", () => {
  test("aggregates agent outcomes and writes one audit line", async () => {
    const lines: Record<string, unknown>[] = []
    const result = await buildService(lines).analyze("storefront", { url: "https://shop.test" })

    expect(result.score).toBe(40)
    expect(result.riskLevel).toBe("dangerous")
    expect(result.verdictTitle).toBe("Fake checkout")
    expect(result.failedAgents).toEqual(["failing"])
    expect(result.flags).toEqual([
      { severity: "critical", message: "fake checkout" },
      { severity: "info", message: "failing check unavailable" },
    ])

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "analysis completed",
      platform: "storefront",
      score: 40,
      riskLevel: "dangerous",
      failedAgents: ["failing"],
      durationMs: 0,
    })
  })

  test("returns a neutral result for an unsupported platform", async () => {
    const lines: Record<string, unknown>[] = []
    const result = await buildService(lines).analyze("Etsy", {})

    expect(result.platform).toBe("etsy")
    expect(result.analysisPerformed).toBe(false)
    expect(result.score).toBe(100)
    expect(lines[0]).toMatchObject({ msg: "platform not supported; no agents run", platform: "etsy" })
  })

  test("propagates validation errors without running agents", async () => {
    const lines: Record<string, unknown>[] = []
    await expect(buildService(lines).analyze("storefront", { url: 42 })).rejects.toBeInstanceOf(
      RequestValidationError,
    )
    expect(lines).toHaveLength(0)
  })
})
