import { z } from "zod"
import type { MarketplaceListing, MarketplaceRequest, MarketplaceSeller } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { AgentResult } from "../../types"
import type { Agent, AgentContext } from "../agent"
import { Findings } from "../agent"
import { parseJoinYear } from "./parsing"

const SupplierConfidenceSchema = z.object({
  confidence_score: z
    .number()
    .int()
    .min(0)
    .max(100)
    .describe("0 means certainly a scam, 100 means a completely trustworthy seller."),
  verdict_title: z.string().describe("Short, punchy verdict title (at most 10 words)."),
  verdict_message: z
    .string()
    .describe("Two to four sentences explaining the score: seller, price, description and photos."),
  key_concerns: z.array(z.string()),
  positive_signals: z.array(z.string()),
})

export type SupplierConfidence = z.infer<typeof SupplierConfidenceSchema>

const SYSTEM_PROMPT = [
  "You are an expert at spotting scams on second-hand marketplaces.",
  "You are direct, slightly cynical and genuinely protective of the buyer.",
  "Titles are short and memorable, for example \"Smells like smoke, and it's not a barbecue\" or \"Looks legit, go for it\".",
  "Score guide: 80-100 trustworthy seller and low risk; 50-79 proceed with caution;",
  "0-49 high scam risk (new account, unrealistic price, stock photos, clear scam signals).",
].join("\n")

const DESCRIPTION_EXCERPT_CHARS = 500

/** Deduction for a confidence score: none when confident, more as confidence drops. */
export function confidenceImpact(confidence: number): number {
  if (confidence >= 80) {
    return 0
  }
  if (confidence >= 50) {
    return 10
  }
  return 25
}

export class SupplierConfidenceAgent implements Agent<MarketplaceRequest> {
  readonly name = "supplier_confidence"
  readonly role = "verdict" as const

  constructor(
    private readonly llm: StructuredLlm,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(request: MarketplaceRequest, { signal }: AgentContext): Promise<AgentResult> {
    const findings = new Findings()

    if (!this.llm.enabled) {
      findings.add("info", "Seller assessment skipped: no LLM provider is configured.")
      return findings.set("analysis_method", "skipped").finish()
    }

    const assessment = await this.llm.generate({
      schema: SupplierConfidenceSchema,
      system: SYSTEM_PROMPT,
      prompt: this.buildPrompt(request),
      maxTokens: 1500,
      signal,
    })

    for (const concern of assessment.key_concerns) {
      findings.add("warning", concern)
    }
    for (const positive of assessment.positive_signals) {
      findings.add("info", positive)
    }

    findings.adjust(confidenceImpact(assessment.confidence_score))
    findings
      .set("confidence_score", assessment.confidence_score)
      .set("key_concerns", assessment.key_concerns)
      .set("positive_signals", assessment.positive_signals)
      .set("analysis_method", "llm")

    return findings.finish({
      title: assessment.verdict_title.trim(),
      message: assessment.verdict_message.trim(),
    })
  }

  buildPrompt(request: MarketplaceRequest): string {
    return [
      "Assess this marketplace listing.",
      `SELLER:\n${this.describeSeller(request.seller)}`,
      `LISTING:\n${describeListing(request.listing, request.listing_images.length)}`,
      [
        "Give a confidence score (0-100), explain in detail why the seller is or is not trustworthy,",
        "list specific concerns and positive signals, and write a verdict that covers seller, price and description.",
      ].join(" "),
    ].join("\n\n")
  }

  private describeSeller(seller?: MarketplaceSeller): string {
    if (!seller) {
      return "Seller information could not be collected."
    }

    const lines: string[] = []
    if (seller.name) {
      lines.push(`- Name: ${seller.name}`)
    }
    if (seller.join_date) {
      lines.push(`- Joined: ${seller.join_date}`)
      const joinYear = parseJoinYear(seller.join_date)
      if (joinYear !== null) {
        lines.push(`- Years on the platform: ${this.now().getFullYear() - joinYear}`)
      }
    }
    if (seller.location) {
      lines.push(`- Seller location: ${seller.location}`)
    }
    if (seller.listings_count) {
      lines.push(`- Listings: ${seller.listings_count}`)
    }
    if (seller.followers_count !== undefined) {
      lines.push(`- Followers: ${seller.followers_count}`)
    }
    if (seller.ratings_count !== undefined) {
      lines.push(`- Ratings: ${seller.ratings_count}`)
    }
    if (seller.ratings_average !== undefined) {
      lines.push(`- Average rating: ${seller.ratings_average} stars`)
    }
    if (seller.badges.length > 0) {
      lines.push(`- Badges: ${seller.badges.join(", ")}`)
    }
    if (seller.strengths.length > 0) {
      lines.push(`- Strengths: ${seller.strengths.join(", ")}`)
    }
    if (seller.response_rate) {
      lines.push(`- Response rate: ${seller.response_rate}`)
    }
    if (seller.verified_identity) {
      lines.push("- Identity verified: yes")
    }

    return lines.length > 0 ? lines.join("\n") : "Seller information is not available."
  }
}

function describeListing(listing: MarketplaceListing | undefined, attachedImages: number): string {
  if (!listing) {
    return "Listing information could not be collected."
  }

  const lines: string[] = []
  if (listing.title) {
    lines.push(`- Title: ${listing.title}`)
  }
  if (listing.price) {
    lines.push(`- Price: ${listing.price}`)
  }
  if (listing.description) {
    const excerpt =
      listing.description.length > DESCRIPTION_EXCERPT_CHARS
        ? `${listing.description.slice(0, DESCRIPTION_EXCERPT_CHARS)}...`
        : listing.description
    lines.push(`- Description: ${excerpt}`)
  }
  if (listing.condition) {
    lines.push(`- Condition: ${listing.condition}`)
  }
  if (listing.location) {
    lines.push(`- Item location: ${listing.location}`)
  }
  if (listing.posted_date) {
    lines.push(`- Posted: ${listing.posted_date}`)
  }
  const images = listing.image_count ?? attachedImages
  lines.push(`- Images: ${images}`)

  return lines.join("\n")
}
