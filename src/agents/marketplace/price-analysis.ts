import { z } from "zod"
import type { MarketplaceRequest } from "../../schemas"
import type { AgentResult } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"
import marketPriceData from "./data/market-prices.json"
import { formatAmount, parsePrice } from "./parsing"

const MarketPriceTableSchema = z.record(
  z.tuple([z.number().nonnegative(), z.number().nonnegative()]),
)

export interface MarketPriceRange {
  product: string
  min: number
  max: number
}

/** Approximate second-hand USD ranges, longest (most specific) product name first. */
export const MARKET_PRICE_RANGES: readonly MarketPriceRange[] = Object.entries(
  MarketPriceTableSchema.parse(marketPriceData),
)
  .map(([product, [min, max]]) => ({ product, min, max }))
  .sort((a, b) => b.product.length - a.product.length)

export function findProductMatch(
  title: string,
  ranges: readonly MarketPriceRange[] = MARKET_PRICE_RANGES,
): MarketPriceRange | null {
  const lower = title.toLowerCase()
  return ranges.find((range) => lower.includes(range.product)) ?? null
}

export class PriceAnalysisAgent implements Agent<MarketplaceRequest> {
  readonly name = "price_analysis"

  constructor(private readonly ranges: readonly MarketPriceRange[] = MARKET_PRICE_RANGES) {}

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const listing = request.listing
    if (!listing?.price) {
      return findings.set("price_analysis_available", false).finish()
    }

    const price = parsePrice(listing.price)
    findings
      .set("price_raw", listing.price)
      .set("price_numeric", price)
      .set("price_analysis_available", true)

    if (price === null) {
      findings.add("info", `Could not read the listed price "${listing.price}".`)
      return findings.finish()
    }

    const match = findProductMatch(listing.title ?? "", this.ranges)
    if (match) {
      scoreAgainstMarket(findings, price, match)
    } else {
      findings.set("matched_product", null)
      if (price === 0) {
        findings.add("warning", "Free item: verify that it is legitimate.", 10)
        findings.set("price_tier", "free")
      } else if (price < 10) {
        findings.add("info", "Very low price: verify that it is real.", 5)
        findings.set("price_tier", "very_low")
      } else {
        findings.set("price_tier", "unknown")
      }
    }

    if (price > 0) {
      if (price >= 100 && price < 1000 && price % 100 === 0) {
        findings.set("suspiciously_round", true)
      }

      const condition = listing.condition?.toLowerCase() ?? ""
      if (condition.includes("new") || condition.includes("nuevo")) {
        findings.set("claimed_condition", "new")
      } else if (condition.includes("used") || condition.includes("usado")) {
        findings.set("claimed_condition", "used")
      }
    }

    return findings.finish()
  }
}

function scoreAgainstMarket(findings: Findings, price: number, match: MarketPriceRange): void {
  const { product, min, max } = match
  const market = `${formatAmount(min)}-${formatAmount(max)}`
  const asked = formatAmount(price)

  findings
    .set("matched_product", product)
    .set("market_price_min", min)
    .set("market_price_max", max)

  if (price === 0) {
    findings.add("critical", `${product.toUpperCase()} offered for free: very likely a scam.`, 35)
    findings.set("price_tier", "scam").set("price_vs_market", "free")
  } else if (price < min * 0.3) {
    findings.add("critical", `Absurdly low price for ${product}: ${asked} (market: ${market}).`, 30)
    findings.set("price_tier", "scam").set("price_vs_market", "extreme_low")
  } else if (price < min * 0.5) {
    findings.add("critical", `Highly suspicious price for ${product}: ${asked} (market: ${market}).`, 20)
    findings.set("price_tier", "very_suspicious").set("price_vs_market", "very_low")
  } else if (price < min * 0.7) {
    findings.add("warning", `Low price for ${product}: ${asked} (market: ${market}).`, 10)
    findings.set("price_tier", "suspicious").set("price_vs_market", "low")
  } else if (price <= max * 1.1) {
    findings.add("info", `Reasonable price for ${product}: ${asked}.`, -5)
    findings.set("price_tier", "fair").set("price_vs_market", "market_rate")
  } else {
    findings.add("info", `Above-market price for ${product}: ${asked}.`)
    findings.set("price_tier", "high").set("price_vs_market", "above_market")
  }

  const midpoint = (min + max) / 2
  if (midpoint > 0) {
    findings.set("discount_from_market", Math.round(((midpoint - price) / midpoint) * 1000) / 10)
  }
}
