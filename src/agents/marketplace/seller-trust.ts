import type { MarketplaceRequest, MarketplaceSeller } from "../../schemas"
import type { AgentResult } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"
import { parseJoinYear, parseListingsCount } from "./parsing"

const MISSING_SELLER_IMPACT = 15
const MISSING_JOIN_DATE_IMPACT = 10
// Trust signals can offset at most this many penalty points.
const TRUST_FLOOR = -30

export class SellerTrustAgent implements Agent<MarketplaceRequest> {
  readonly name = "seller_trust"

  constructor(private readonly now: () => Date = () => new Date()) {}

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const seller = request.seller

    if (!seller) {
      findings.add("info", "Seller profile data was not available.", MISSING_SELLER_IMPACT)
      return findings.finish()
    }

    this.scoreAccountAge(findings, seller)

    if (seller.name) {
      findings.set("seller_name", seller.name)
      if (/\d{4,}/.test(seller.name)) {
        findings.add("warning", "Profile name contains a long run of digits.", 5)
      }
    }

    if (seller.response_rate) {
      findings.set("response_rate", seller.response_rate)
      const rate = seller.response_rate.toLowerCase()
      if (rate.includes("hour") || rate.includes("minute")) {
        findings.add("info", `Seller responds quickly: ${seller.response_rate}`)
      }
    }

    if (seller.other_listings_count !== undefined) {
      findings.set("other_listings_count", seller.other_listings_count)
      if (seller.other_listings_count === 0) {
        findings.add("warning", "This is the seller's only listing.", 5)
      } else if (seller.other_listings_count > 50) {
        findings.add("info", `Active seller with ${seller.other_listings_count} listings.`)
      }
    }

    if (seller.listings_count) {
      findings.set("listings_count", seller.listings_count)
      const count = parseListingsCount(seller.listings_count)
      if (count !== null && count >= 10) {
        findings.add("info", `Established seller with ${seller.listings_count} listings.`, -5)
      } else if (count !== null && count <= 2) {
        findings.add("warning", `Seller has few listings (${seller.listings_count}).`, 5)
      }
    }

    if (seller.followers_count !== undefined) {
      findings.set("followers_count", seller.followers_count)
      if (seller.followers_count >= 50) {
        findings.add("info", `Seller has ${seller.followers_count} followers.`, -5)
      } else if (seller.followers_count >= 10) {
        findings.add("info", `Seller has ${seller.followers_count} followers.`)
      }
    }

    this.scoreRatings(findings, seller)
    this.scoreBadges(findings, seller.badges)
    this.scoreStrengths(findings, seller.strengths)

    if (seller.profile_screenshot) {
      findings.set("profile_investigated", true)
    }

    findings.impact = Math.max(findings.impact, TRUST_FLOOR)
    return findings.finish()
  }

  private scoreAccountAge(findings: Findings, seller: MarketplaceSeller): void {
    const joinYear = parseJoinYear(seller.join_date ?? seller.seller_since)
    const years = joinYear === null ? -1 : this.now().getFullYear() - joinYear
    // A join year in the future is as unusable as a missing one.
    if (joinYear === null || years < 0) {
      findings.adjust(MISSING_JOIN_DATE_IMPACT)
      return
    }

    findings.set("account_age_years", years).set("join_year", joinYear)

    if (years < 1) {
      findings.add("critical", `Very new account (created in ${joinYear}).`, 30)
      findings.set("longevity_tier", "very_new")
    } else if (years < 2) {
      findings.add("warning", `Fairly new account (${years} year on the platform).`, 15)
      findings.set("longevity_tier", "new")
    } else if (years < 3) {
      findings.add("info", `Account has been on the platform for ${years} years.`, 5)
      findings.set("longevity_tier", "moderate")
    } else if (years < 5) {
      findings.add("info", `Established account (${years} years on the platform).`)
      findings.set("longevity_tier", "established")
    } else if (years < 10) {
      findings.add("info", `Veteran account (${years} years on the platform).`, -10)
      findings.set("longevity_tier", "veteran")
    } else {
      findings.add("info", `Long-standing account (${years}+ years on the platform).`, -15)
      findings.set("longevity_tier", "senior")
    }
  }

  private scoreRatings(findings: Findings, seller: MarketplaceSeller): void {
    if (seller.ratings_count !== undefined) {
      findings.set("ratings_count", seller.ratings_count)
      if (seller.ratings_count >= 10) {
        findings.add("info", `Seller has ${seller.ratings_count} ratings.`, -10)
      } else if (seller.ratings_count >= 5) {
        findings.add("info", `Seller has ${seller.ratings_count} ratings.`, -5)
      } else if (seller.ratings_count === 0) {
        findings.add("warning", "Seller has no ratings.", 10)
      }
    }

    if (seller.ratings_average !== undefined) {
      const average = seller.ratings_average
      findings.set("ratings_average", average)
      if (average >= 4.5) {
        findings.add("info", `Excellent rating: ${average.toFixed(1)} stars.`, -10)
      } else if (average >= 4) {
        findings.add("info", `Good rating: ${average.toFixed(1)} stars.`, -5)
      } else if (average < 3) {
        findings.add("critical", `Low rating: ${average.toFixed(1)} stars.`, 20)
      }
    }
  }

  private scoreBadges(findings: Findings, badges: readonly string[]): void {
    if (badges.length === 0) {
      return
    }

    findings.set("badges", badges)
    for (const badge of badges) {
      const lower = badge.toLowerCase()
      if (lower.includes("buena calificación") || lower.includes("good rating")) {
        findings.add("info", `Badge: ${badge}`, -10)
      } else if (lower.includes("responde rápido") || lower.includes("responds quickly")) {
        findings.add("info", `Badge: ${badge}`, -5)
      } else if (lower.includes("destacado") || lower.includes("top")) {
        findings.add("info", "Top-rated seller.", -15)
      }
    }
  }

  private scoreStrengths(findings: Findings, strengths: readonly string[]): void {
    if (strengths.length === 0) {
      return
    }

    findings.set("strengths", strengths)
    // Entries look like "Communication (13)".
    const positiveReviews = strengths.reduce((total, strength) => {
      const match = /\((\d+)\)/.exec(strength)
      return match?.[1] ? total + Number.parseInt(match[1], 10) : total
    }, 0)

    if (positiveReviews >= 20) {
      findings.add("info", `Seller has ${positiveReviews}+ positive reviews on key aspects.`, -10)
    } else if (positiveReviews >= 5) {
      findings.add("info", `Seller strengths: ${strengths.slice(0, 3).join(", ")}`, -5)
    }
  }
}
