import type { MarketplaceRequest } from "../../schemas"
import type { AgentResult, Severity } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"
import { parseListingsCount } from "./parsing"

interface ExperienceTier {
  max: number
  experience: string
  severity: Severity
  impact: number
  message: (count: number) => string
}

const EXPERIENCE_TIERS: ExperienceTier[] = [
  { max: 0, experience: "first_time", severity: "critical", impact: 25, message: () => "Seller's first listing (no history)." },
  { max: 2, experience: "beginner", severity: "warning", impact: 15, message: (n) => `Seller has very few listings (${n}).` },
  { max: 5, experience: "novice", severity: "info", impact: 5, message: (n) => `Seller has few listings (${n}).` },
  { max: 20, experience: "moderate", severity: "info", impact: 0, message: (n) => `Seller has a moderate history (${n}+ listings).` },
  { max: 50, experience: "experienced", severity: "info", impact: -10, message: (n) => `Experienced seller (${n}+ listings).` },
  { max: Number.POSITIVE_INFINITY, experience: "power_seller", severity: "info", impact: -15, message: (n) => `Very active seller (${n}+ listings).` },
]

export class SellerHistoryAgent implements Agent<MarketplaceRequest> {
  readonly name = "seller_history"

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const seller = request.seller
    if (!seller) {
      return findings.finish()
    }

    const count = parseListingsCount(seller.listings_count)
    findings.set("listings_count_parsed", count)

    if (count === null) {
      findings.set("has_listing_history", null)
      if (seller.other_listings_count !== undefined) {
        findings.set("other_listings_count", seller.other_listings_count)
        if (seller.other_listings_count === 0) {
          findings.add("warning", "This is the seller's only listing.", 10)
        }
      }
      return findings.finish()
    }

    findings.set("has_listing_history", count > 0)
    const tier = EXPERIENCE_TIERS.find((candidate) => count <= candidate.max)
    if (tier) {
      findings.add(tier.severity, tier.message(count), tier.impact)
      findings.set("seller_experience", tier.experience)
    }

    return findings.finish()
  }
}
