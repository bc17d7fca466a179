import type { MarketplaceRequest } from "../../schemas"
import type { AgentResult } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"
import { parsePrice } from "./parsing"

const HIGH_VALUE_KEYWORDS = ["iphone", "macbook", "playstation", "ps5", "xbox", "nintendo", "laptop", "samsung", "gpu", "rtx"]
const URGENCY_PATTERNS = ["urge", "urgente", "hoy", "today only", "must go", "moving"]

/** Quick too-good-to-be-true checks on the asking price. */
export class PricingAgent implements Agent<MarketplaceRequest> {
  readonly name = "pricing"

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const listing = request.listing
    if (!listing?.price) {
      return findings.finish()
    }

    const price = parsePrice(listing.price)
    const title = (listing.title ?? "").toLowerCase()
    const description = (listing.description ?? "").toLowerCase()
    findings.set("price_raw", listing.price)

    if (price !== null) {
      findings.set("price_numeric", price)

      if (price === 0) {
        findings.add("warning", "Free item: make sure it is not bait.", 10)
      }

      const keyword = HIGH_VALUE_KEYWORDS.find((candidate) => title.includes(candidate))
      if (keyword && price > 0 && price < 100) {
        findings.add("critical", `Suspiciously low price for ${keyword.toUpperCase()}: ${listing.price}`, 25)
      } else if (keyword && price > 0 && price < 300) {
        findings.add("warning", `Very low price for ${keyword.toUpperCase()}: ${listing.price}`, 10)
      }
    }

    if (URGENCY_PATTERNS.some((pattern) => title.includes(pattern) || description.includes(pattern))) {
      findings.set("has_urgency", true)
    }

    return findings.finish()
  }
}
