import { describe, expect, test } from "vitest"
import { z } from "zod"
import { loadConfig } from "../src/config"
import { createSilentLoggers } from "../src/logger"
import { LlmClient, LlmUnavailableError, LruCache } from "../src/services/llm-client"
import type { ObjectGenerator } from "../src/services/llm-client"

const AnswerSchema = z.object({ answer: z.string() })
const logger = createSilentLoggers().app

interface RecordedCall {
  modelId: string
  maxTokens: number
  content: unknown
}

function recordingGenerator(calls: RecordedCall[], answer = "yes"): ObjectGenerator {
  return async (options) => {
    calls.push({
      modelId: options.model.modelId,
      maxTokens: options.maxTokens,
      content: options.messages[0]?.content,
    })
    return { object: options.schema.parse({ answer }) }
  }
}

function llmSettings(env: Record<string, string> = {}) {
  return loadConfig({ SHOPWARDEN_OPENAI_API_KEY: "test-secret", ...env }).llm
}

describe("llm client", () => {
  test("refuses to call out when no provider is configured", async () => {
    const calls: RecordedCall[] = []
    const client = new LlmClient(loadConfig({}).llm, logger, { generator: recordingGenerator(calls) })

    expect(client.enabled).toBe(false)
    await expect(client.generate({ schema: AnswerSchema, system: "s", prompt: "p" })).rejects.toBeInstanceOf(
      LlmUnavailableError,
    )
    expect(calls).toHaveLength(0)
  })

  test("answers repeated requests from the cache", async () => {
    const calls: RecordedCall[] = []
    const client = new LlmClient(llmSettings(), logger, { generator: recordingGenerator(calls) })

    const first = await client.generate({ schema: AnswerSchema, system: "s", prompt: "same" })
    const second = await client.generate({ schema: AnswerSchema, system: "s", prompt: "same" })
    await client.generate({ schema: AnswerSchema, system: "s", prompt: "different" })

    expect(first).toEqual({ answer: "yes" })
    expect(second).toEqual({ answer: "yes" })
    expect(calls).toHaveLength(2)
    expect(calls[0]).toEqual({ modelId: "gpt-4o-mini", maxTokens: 1024, content: "same" })
  })

  test("does not cache when the cache size is zero", async () => {
    const calls: RecordedCall[] = []
    const client = new LlmClient(llmSettings({ SHOPWARDEN_LLM_CACHE_SIZE: "0" }), logger, {
      generator: recordingGenerator(calls),
    })

    await client.generate({ schema: AnswerSchema, system: "s", prompt: "same" })
    await client.generate({ schema: AnswerSchema, system: "s", prompt: "same" })

    expect(calls).toHaveLength(2)
  })

  test("sends screenshots to the vision model", async () => {
    const calls: RecordedCall[] = []
    const client = new LlmClient(llmSettings({ SHOPWARDEN_LLM_VISION_MODEL: "gpt-4o" }), logger, {
      generator: recordingGenerator(calls),
    })

    await client.generate({ schema: AnswerSchema, system: "s", prompt: "look", imageBase64: "aW1n", maxTokens: 300 })

    expect(calls).toEqual([
      {
        modelId: "gpt-4o",
        maxTokens: 300,
        content: [
          { type: "text", text: "look" },
          { type: "image", image: "aW1n", mimeType: "image/png" },
        ],
      },
    ])
  })

  test("limits concurrent calls", async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    let started = 0

    const client = new LlmClient(llmSettings({ SHOPWARDEN_LLM_MAX_CONCURRENCY: "1" }), logger, {
      generator: async (options) => {
        started += 1
        await gate
        return { object: options.schema.parse({ answer: "done" }) }
      },
    })

    const first = client.generate({ schema: AnswerSchema, system: "s", prompt: "one" })
    const second = client.generate({ schema: AnswerSchema, system: "s", prompt: "two" })
    await new Promise((resolve) => setTimeout(resolve, 10))

    expect(started).toBe(1)
    release()
    await expect(Promise.all([first, second])).resolves.toEqual([{ answer: "done" }, { answer: "done" }])
    expect(started).toBe(2)
  })
})

describe("lru cache", () => {
  test("evicts the least recently used entry", () => {
    const cache = new LruCache<number>(2)
    cache.set("a", 1)
    cache.set("b", 2)
    expect(cache.get("a")).toBe(1)
    cache.set("c", 3)

    expect(cache.has("a")).toBe(true)
    expect(cache.has("b")).toBe(false)
    expect(cache.has("c")).toBe(true)
    expect(cache.size).toBe(2)
  })

  test("stores nothing with zero capacity", () => {
    const cache = new LruCache<number>(0)
    cache.set("a", 1)
    expect(cache.size).toBe(0)
  })
})
