import { z } from "zod"
import type { MarketplaceRequest } from "../../schemas"
import type { AgentResult } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"
import patternData from "./data/red-flag-patterns.json"
import { parsePostedDays } from "./parsing"

const PatternSchema = z.object({ pattern: z.string().min(1), message: z.string() })

const RedFlagPatternsSchema = z.object({
  payment: z.array(PatternSchema),
  contact: z.array(PatternSchema),
  phrases: z.array(PatternSchema),
})

export type RedFlagPatterns = z.infer<typeof RedFlagPatternsSchema>

export const RED_FLAG_PATTERNS: RedFlagPatterns = RedFlagPatternsSchema.parse(patternData)

const EMAIL = /\b[\w.-]+@[\w.-]+\.\w+\b/

export class RedFlagsAgent implements Agent<MarketplaceRequest> {
  readonly name = "red_flags"

  constructor(private readonly patterns: RedFlagPatterns = RED_FLAG_PATTERNS) {}

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const listing = request.listing
    const text = `${listing?.title ?? ""} ${listing?.description ?? ""}`.toLowerCase()

    // One payment and one contact finding at most; scam phrases each count.
    const payment = this.patterns.payment.find((entry) => text.includes(entry.pattern))
    if (payment) {
      findings.add("critical", payment.message, 20)
      findings.set("payment_red_flag", payment.pattern)
    }

    const contact = this.patterns.contact.find((entry) => text.includes(entry.pattern))
    if (contact) {
      findings.add("warning", contact.message, 10)
      findings.set("contact_bypass", contact.pattern)
    }

    if (EMAIL.test(text)) {
      findings.add("warning", "Listing text contains an email address.", 5)
      findings.set("email_in_description", true)
    }

    for (const phrase of this.patterns.phrases) {
      if (text.includes(phrase.pattern)) {
        findings.add("info", phrase.message, 3)
      }
    }

    const listingLocation = listing?.location
    const sellerLocation = request.seller?.location
    if (listingLocation && sellerLocation && listingLocation.toLowerCase() !== sellerLocation.toLowerCase()) {
      findings.add(
        "warning",
        `Item location (${listingLocation}) differs from the seller's (${sellerLocation}).`,
        10,
      )
      findings.set("location_mismatch", true)
    }

    const daysPosted = parsePostedDays(listing?.posted_date)
    if (daysPosted !== null) {
      findings.set("days_posted", daysPosted)
    }

    return findings.finish()
  }
}
