import type pino from "pino"
import { z } from "zod"
import type { PriceComparisonSettings } from "../../config"
import type { StorefrontRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { WebSearch } from "../../services/search-orchestrator"
import type { AgentResult } from "../../types"
import type { Agent, AgentContext } from "../agent"
import { Findings } from "../agent"
import { extractDomain } from "./domains"

const SEARCH_RESULTS = 20
const MAX_COMPARISONS = 5
const MIN_LLM_CONFIDENCE = 50
const REGEX_CONFIDENCE = 30
const CONTENT_CHARS = 1_500

const TITLE_SEPARATORS = [" | ", " - ", " – ", " — "]
const PRICE_HINT = /(?:\$|CLP|USD|EUR|€|£)\s?\d/
const PRICE_AMOUNT = /(?:\$|CLP|USD|EUR|€|£)\s?(\d{1,3}(?:[.,]\d{3})+)/g

const ExtractedPriceSchema = z.object({
  current_price: z
    .number()
    .int()
    .positive()
    .nullable()
    .describe("Current sale price as an integer: not the crossed-out price, not an installment."),
  currency: z.string().describe("ISO currency code, for example CLP or USD."),
  is_installment: z.boolean().describe("True if the amount looks like a monthly installment."),
  confidence: z.number().min(0).max(100),
})

const EXTRACTION_SYSTEM_PROMPT = [
  "You extract the CURRENT sale price of a product from e-commerce page text.",
  "Ignore crossed-out original prices, installment amounts (for example '12 payments of $22.499'), and shipping costs.",
  "When a discount is shown, the current price is the lower one.",
  "Dots or commas may be thousands separators ($269.990 is 269990).",
  "Return the price as an integer without separators, or null when unsure.",
].join("\n")

export interface PriceComparison {
  store: string
  title: string
  price_text: string
  price_numeric: number
  url: string
  extraction_method: "llm" | "regex_fallback"
  confidence: number
}

interface Candidate {
  url: string
  store: string
  title: string
  content: string
}

/** First segment of a storefront title ("Trail Shoe X | Acme" gives "Trail Shoe X"). */
export function extractProductName(title?: string): string {
  if (!title) {
    return ""
  }

  for (const separator of TITLE_SEPARATORS) {
    if (title.includes(separator)) {
      return (title.split(separator)[0] ?? "").trim()
    }
  }

  return title.trim()
}

/**
 * Lowest thousands-grouped amount at or above `installmentFloor`. Smaller
 * amounts are assumed to be installments.
 */
export function extractPriceFallback(content: string, installmentFloor: number): number | null {
  const prices: number[] = []
  for (const match of content.matchAll(PRICE_AMOUNT)) {
    const digits = (match[1] ?? "").replace(/[.,]/g, "")
    const value = Number.parseInt(digits, 10)
    if (Number.isFinite(value) && value >= installmentFloor) {
      prices.push(value)
    }
  }

  return prices.length > 0 ? Math.min(...prices) : null
}

export function formatPrice(value: number): string {
  return `$${value.toLocaleString("en-US").replace(/,/g, ".")}`
}

export class PriceComparisonAgent implements Agent<StorefrontRequest> {
  readonly name = "price_comparison"

  constructor(
    private readonly search: WebSearch,
    private readonly llm: StructuredLlm,
    private readonly settings: PriceComparisonSettings,
  ) {}

  async run(request: StorefrontRequest, { signal, logger }: AgentContext): Promise<AgentResult> {
    const findings = new Findings()

    if (!this.search.enabled) {
      return findings.set("checked", false).set("reason", "web search is disabled").finish()
    }

    const productName = extractProductName(request.title)
    if (productName.length < 3) {
      findings.add("info", "Price comparison skipped: no product name could be determined.")
      return findings.set("checked", false).set("reason", "no product name").finish()
    }

    const region = this.settings.region ? ` ${this.settings.region}` : ""
    const response = await this.search.search({
      query: `buy "${productName}" price${region}`,
      count: SEARCH_RESULTS,
      signal,
    })
    logger.debug({ provider: response.provider, results: response.results.length }, "price search")

    const currentDomain = extractDomain(request.url)
    const seenStores = new Set<string>()
    const candidates: Candidate[] = []
    for (const result of response.results) {
      const store = extractDomain(result.url)
      if (store.includes(currentDomain) || currentDomain.includes(store) || seenStores.has(store)) {
        continue
      }
      if (!PRICE_HINT.test(result.snippet)) {
        continue
      }
      seenStores.add(store)
      candidates.push({ url: result.url, store, title: result.title, content: result.snippet })
    }

    const extracted = await Promise.all(
      candidates
        .slice(0, MAX_COMPARISONS)
        .map((candidate) => this.extract(candidate, productName, signal, logger)),
    )
    const comparisons = extracted.filter((item): item is PriceComparison => item !== null)

    if (comparisons.length > 0) {
      findings.add(
        "info",
        `This product is also sold by ${comparisons.length} other ${comparisons.length === 1 ? "store" : "stores"}. Compare prices before buying.`,
      )
    }

    logger.debug({ candidates: candidates.length, comparisons: comparisons.length }, "price comparison complete")

    return findings
      .set("checked", true)
      .set("product_name", productName)
      .set("search_provider", response.provider)
      .set("comparisons", comparisons)
      .finish()
  }

  private async extract(
    candidate: Candidate,
    productName: string,
    signal: AbortSignal,
    logger: pino.Logger,
  ): Promise<PriceComparison | null> {
    const llmPrice = await this.extractWithLlm(candidate, productName, signal, logger)
    if (llmPrice) {
      return {
        store: candidate.store,
        title: candidate.title,
        price_text: formatPrice(llmPrice.price),
        price_numeric: llmPrice.price,
        url: candidate.url,
        extraction_method: "llm",
        confidence: llmPrice.confidence,
      }
    }

    const fallback = extractPriceFallback(candidate.content, this.settings.installmentFloor)
    if (fallback === null) {
      return null
    }

    return {
      store: candidate.store,
      title: candidate.title,
      price_text: formatPrice(fallback),
      price_numeric: fallback,
      url: candidate.url,
      extraction_method: "regex_fallback",
      confidence: REGEX_CONFIDENCE,
    }
  }

  private async extractWithLlm(
    candidate: Candidate,
    productName: string,
    signal: AbortSignal,
    logger: pino.Logger,
  ): Promise<{ price: number; confidence: number } | null> {
    if (!this.llm.enabled) {
      return null
    }

    try {
      const result = await this.llm.generate({
        schema: ExtractedPriceSchema,
        system: EXTRACTION_SYSTEM_PROMPT,
        prompt: [
          `Product searched: ${productName}`,
          `Result title: ${candidate.title}`,
          `Page content:\n${candidate.content.slice(0, CONTENT_CHARS)}`,
          "Extract the CURRENT price of the product.",
        ].join("\n\n"),
        maxTokens: 200,
        signal,
      })

      if (
        result.current_price === null ||
        result.is_installment ||
        result.confidence < MIN_LLM_CONFIDENCE
      ) {
        return null
      }
      return { price: result.current_price, confidence: result.confidence }
    } catch (error) {
      signal.throwIfAborted()
      logger.warn({ error, store: candidate.store }, "price extraction failed; trying pattern match")
      return null
    }
  }
}
