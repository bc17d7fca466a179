import { createHash } from "node:crypto"
import { createOpenAI } from "@ai-sdk/openai"
import { generateObject } from "ai"
import type { CoreMessage, LanguageModel } from "ai"
import { createOllama } from "ollama-ai-provider"
import type pino from "pino"
import type { z } from "zod"
import { isLlmConfigured } from "../config"
import type { LlmSettings } from "../config"
import { ConcurrencyGate } from "./rate-limiter"

export class LlmUnavailableError extends Error {
  constructor(message = "No LLM provider is configured") {
    super(message)
    this.name = "LlmUnavailableError"
  }
}

export interface StructuredLlmRequest<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  system: string
  prompt: string
  /** PNG screenshot; switches the call to the vision model. */
  imageBase64?: string
  maxTokens?: number
  signal?: AbortSignal
}

/** The slice of the LLM client that agents depend on. */
export interface StructuredLlm {
  readonly enabled: boolean
  generate<T>(request: StructuredLlmRequest<T>): Promise<T>
}

export interface ObjectGenerationOptions<T> {
  model: LanguageModel
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  system: string
  messages: CoreMessage[]
  maxTokens: number
  abortSignal?: AbortSignal
}

export type ObjectGenerator = <T>(options: ObjectGenerationOptions<T>) => Promise<{ object: T }>

const generateStructuredObject: ObjectGenerator = (options) =>
  generateObject({
    model: options.model,
    schema: options.schema,
    system: options.system,
    messages: options.messages,
    maxTokens: options.maxTokens,
    abortSignal: options.abortSignal,
    temperature: 0,
  })

interface LlmClientDependencies {
  generator?: ObjectGenerator
}

const DEFAULT_MAX_TOKENS = 1024

export class LlmClient implements StructuredLlm {
  private readonly gate: ConcurrencyGate
  private readonly cache: LruCache<unknown>
  private readonly generator: ObjectGenerator

  constructor(
    private readonly settings: LlmSettings,
    private readonly logger: pino.Logger,
    dependencies: LlmClientDependencies = {},
  ) {
    this.gate = new ConcurrencyGate(settings.maxConcurrency)
    this.cache = new LruCache(settings.cacheSize)
    this.generator = dependencies.generator ?? generateStructuredObject
  }

  get enabled(): boolean {
    return isLlmConfigured(this.settings)
  }

  async generate<T>(request: StructuredLlmRequest<T>): Promise<T> {
    if (!this.enabled) {
      throw new LlmUnavailableError()
    }

    const modelName = request.imageBase64 ? this.settings.visionModel : this.settings.model
    const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS
    const key = cacheKey(modelName, maxTokens, request)

    if (this.cache.has(key)) {
      const cached = request.schema.safeParse(this.cache.get(key))
      if (cached.success) {
        this.logger.debug({ model: modelName }, "llm cache hit")
        return cached.data
      }
      this.cache.delete(key)
    }

    const object = await this.gate.run(async () => {
      request.signal?.throwIfAborted()
      const result = await this.generator({
        model: this.getModel(modelName),
        schema: request.schema,
        system: request.system,
        messages: [toUserMessage(request.prompt, request.imageBase64)],
        maxTokens,
        abortSignal: request.signal,
      })
      return request.schema.parse(result.object)
    })

    this.cache.set(key, object)
    return object
  }

  private getModel(modelName: string): LanguageModel {
    if (this.settings.provider === "ollama") {
      const provider = createOllama({
        baseURL: this.settings.ollamaBaseUrl,
      })

      return provider(modelName)
    }

    if (!this.settings.openaiApiKey) {
      throw new LlmUnavailableError(
        "SHOPWARDEN_OPENAI_API_KEY required when SHOPWARDEN_LLM_PROVIDER=openai",
      )
    }

    const provider = createOpenAI({
      apiKey: this.settings.openaiApiKey,
    })

    return provider(modelName)
  }
}

function toUserMessage(prompt: string, imageBase64?: string): CoreMessage {
  if (!imageBase64) {
    return { role: "user", content: prompt }
  }

  return {
    role: "user",
    content: [
      { type: "text", text: prompt },
      { type: "image", image: imageBase64, mimeType: "image/png" },
    ],
  }
}

function cacheKey<T>(model: string, maxTokens: number, request: StructuredLlmRequest<T>): string {
  const hash = createHash("sha256")
  hash.update(JSON.stringify([model, maxTokens, request.system, request.prompt]))
  if (request.imageBase64) {
    hash.update(request.imageBase64)
  }
  return hash.digest("hex")
}

/** Insertion-ordered Map used as a least-recently-used cache. */
export class LruCache<V> {
  private readonly entries = new Map<string, V>()

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.entries.size
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  get(key: string): V | undefined {
    const value = this.entries.get(key)
    if (value !== undefined) {
      this.entries.delete(key)
      this.entries.set(key, value)
    }
    return value
  }

  set(key: string, value: V): void {
    if (this.capacity <= 0) {
      return
    }

    this.entries.delete(key)
    this.entries.set(key, value)

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) {
        break
      }
      this.entries.delete(oldest.value)
    }
  }

  delete(key: string): void {
    this.entries.delete(key)
  }
}
