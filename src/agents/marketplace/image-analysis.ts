import { z } from "zod"
import type { MarketplaceRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { AgentResult } from "../../types"
import type { Agent, AgentContext } from "../agent"
import { Findings } from "../agent"

const ImageAnalysisSchema = z.object({
  is_stock_photo: z.boolean().describe("True if the photos look like stock or internet images."),
  is_professional: z.boolean().describe("True if the photos look studio-made (lighting, perfect angles)."),
  has_watermark: z.boolean(),
  background_consistent: z.boolean().describe("True if the setting looks consistent and authentic."),
  shows_actual_product: z.boolean().describe("True if the photos clearly show the item being sold."),
  confidence: z.number().min(0).max(100).describe("Authenticity confidence: 0 likely fake, 100 certainly real."),
  concerns: z.array(z.string()),
  positive_signals: z.array(z.string()),
  product_description: z.string().describe("Short description of the item and its visible condition."),
  apparent_condition: z.string().describe("One of: new, like new, used, heavily used, damaged."),
})

export type ImageAnalysis = z.infer<typeof ImageAnalysisSchema>

const SYSTEM_PROMPT = [
  "You analyze product photos on second-hand marketplace listings.",
  "Judge whether the photos are authentic or taken from the internet, describe the item's apparent condition,",
  "and note anything suspicious or reassuring. Be specific and useful to the buyer.",
].join(" ")

const USER_PROMPT = [
  "Analyze this screenshot of a marketplace listing.",
  "1. Do the photos look like stock images or were they taken by the seller?",
  "2. Are there watermarks or logos?",
  "3. Is the item clearly visible? What condition does it appear to be in?",
  "4. Is the setting consistent (a real home rather than a studio)?",
  "5. Briefly describe what the photos show.",
].join("\n")

export class ImageAnalysisAgent implements Agent<MarketplaceRequest> {
  readonly name = "image_analysis"

  constructor(private readonly llm: StructuredLlm) {}

  async run(request: MarketplaceRequest, { signal, logger }: AgentContext): Promise<AgentResult> {
    const findings = new Findings()
    const imageCount = request.listing?.image_count || request.listing_images.length
    scoreImageCount(findings, imageCount)

    const screenshot = request.screenshot_base64
    findings.set("screenshot_available", Boolean(screenshot))
    if (!screenshot || !this.llm.enabled) {
      return findings.finish()
    }

    try {
      const analysis = await this.llm.generate({
        schema: ImageAnalysisSchema,
        system: SYSTEM_PROMPT,
        prompt: USER_PROMPT,
        imageBase64: screenshot,
        maxTokens: 800,
        signal,
      })
      scoreVision(findings, analysis)
    } catch (error) {
      signal.throwIfAborted()
      logger.warn({ error }, "image vision check failed; keeping image count result")
      findings.set("ai_analysis_error", error instanceof Error ? error.message : String(error))
    }

    return findings.finish()
  }
}

export function scoreImageCount(findings: Findings, imageCount: number): void {
  findings.set("image_count", imageCount)

  if (imageCount === 0) {
    findings.add("warning", "Listing has no images.", 15)
    findings.set("image_quality_tier", "none")
  } else if (imageCount === 1) {
    findings.adjust(5)
    findings.set("image_quality_tier", "minimal")
  } else if (imageCount >= 5) {
    findings.add("info", `Several images available (${imageCount}).`, -5)
    findings.set("image_quality_tier", "excellent")
  } else if (imageCount >= 3) {
    findings.set("image_quality_tier", "good")
  } else {
    findings.set("image_quality_tier", "adequate")
  }
}

export function scoreVision(findings: Findings, analysis: ImageAnalysis): void {
  findings.set("ai_analysis", {
    is_stock_photo: analysis.is_stock_photo,
    is_professional: analysis.is_professional,
    has_watermark: analysis.has_watermark,
    background_consistent: analysis.background_consistent,
    shows_actual_product: analysis.shows_actual_product,
    confidence: analysis.confidence,
    product_description: analysis.product_description,
    apparent_condition: analysis.apparent_condition,
  })

  if (analysis.is_stock_photo) {
    findings.add("critical", "Images look like stock or internet photos.", 25)
  }
  if (analysis.has_watermark) {
    findings.add("warning", "Images carry watermarks.", 15)
  }
  if (analysis.is_professional && !analysis.shows_actual_product) {
    findings.add("warning", "Photos look too professional for a personal listing.", 10)
  }
  if (!analysis.background_consistent) {
    findings.add("warning", "Image backgrounds are inconsistent.", 10)
  }
  if (!analysis.shows_actual_product) {
    findings.add("warning", "The actual item is not clearly shown.", 10)
  }

  for (const concern of analysis.concerns) {
    findings.add("warning", concern)
  }
  for (const positive of analysis.positive_signals) {
    findings.add("info", positive)
  }

  if (analysis.confidence >= 80) {
    findings.add("info", "Images look authentic.", -5)
  } else if (analysis.confidence < 40) {
    findings.add("warning", "Low confidence that the images are authentic.", 10)
  }

  findings.set("image_authenticity_confidence", analysis.confidence)
}
