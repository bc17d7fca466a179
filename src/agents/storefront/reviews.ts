import type pino from "pino"
import { z } from "zod"
import type { StorefrontRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { SearchExecution, WebSearch } from "../../services/search-orchestrator"
import type { SearchResult } from "../../services/search-provider"
import type { AgentResult } from "../../types"
import type { Agent, AgentContext } from "../agent"
import { Findings } from "../agent"
import { extractDomain } from "./domains"

const RESULTS_PER_SEARCH = 5
const MIN_REVIEWS_FOR_SUMMARY = 3
const DISPLAYED_REVIEWS = 5
const MIN_SNIPPET_CHARS = 50

const OTHER_TLDS = [".com", ".net", ".org", ".es", ".mx", ".ar", ".co", ".us", ".uk"]
const STORE_SUFFIX = /\s*(Chile|México|Mexico|Argentina|España|Spain|Colombia|Online|Store|Shop|Tienda).*$/i
const TITLE_SEPARATORS = [" | ", " - ", " – ", " — "]
const TRUSTPILOT_RATING = /(\d[.,]\d)\s*(out of 5|\/5|stars|estrellas|-star)/i

export interface Review {
  source: string
  title: string
  content: string
  url: string
}

const ReputationSummarySchema = z.object({
  summary: z.string().describe("Two or three sentences on the business's overall reputation."),
  sentiment: z.number().min(0).max(100).describe("0 very negative, 50 neutral, 100 very positive."),
  key_positives: z.array(z.string()).describe("Up to three positive aspects."),
  key_negatives: z.array(z.string()).describe("Up to three negative aspects or concerns."),
  trust_assessment: z.enum(["trustworthy", "neutral", "suspicious"]),
})

type ReputationSummary = z.infer<typeof ReputationSummarySchema>

/** Brand from a title suffix such as "Running Shoes | Acme Chile", else the capitalised domain label. */
export function extractBusinessName(url: string, title?: string): string {
  const domain = extractDomain(url)
  const label = domain.split(".")[0] ?? domain

  if (title) {
    for (const separator of TITLE_SEPARATORS) {
      if (!title.includes(separator)) {
        continue
      }
      const parts = title.split(separator)
      const brand = (parts[parts.length - 1] ?? "").trim().replace(STORE_SUFFIX, "").trim()
      if (brand.length > 2) {
        return brand
      }
    }
  }

  return label.charAt(0).toUpperCase() + label.slice(1)
}

/** True when `text` talks about the same brand on another TLD (acme.com while checking acme.cl). */
function mentionsOtherTld(text: string, domainBase: string, domainTld: string): boolean {
  return OTHER_TLDS.some((tld) => tld !== domainTld && text.includes(`${domainBase}${tld}`))
}

function labelSource(url: string): string {
  if (url.includes("trustpilot.com")) {
    return "Trustpilot"
  }
  if (url.includes("google.com/maps")) {
    return "Google Maps"
  }
  if (url.includes("google")) {
    return "Google"
  }
  if (url.includes("facebook")) {
    return "Facebook"
  }
  if (url.includes("yelp")) {
    return "Yelp"
  }
  if (url.includes("reddit")) {
    return "Reddit"
  }
  return "Web"
}

function toReview(result: SearchResult, source: string, fallbackTitle: string): Review {
  return {
    source,
    title: result.title ? result.title.slice(0, 100) : fallbackTitle,
    content: result.snippet.slice(0, 300),
    url: result.url,
  }
}

export class ReviewsAgent implements Agent<StorefrontRequest> {
  readonly name = "reviews"

  constructor(
    private readonly search: WebSearch,
    private readonly llm: StructuredLlm,
  ) {}

  async run(request: StorefrontRequest, { signal, logger }: AgentContext): Promise<AgentResult> {
    const findings = new Findings()

    if (!this.search.enabled) {
      findings.add("info", "Review search skipped: web search is disabled.")
      findings.set("reviews_checked", false)
      return findings.finish()
    }

    const domain = extractDomain(request.url)
    const businessName = extractBusinessName(request.url, request.title)
    const domainBase = domain.split(".")[0] ?? domain
    const domainTld = `.${domain.split(".").pop() ?? ""}`

    const [mapsResponse, trustpilotResponse, generalResponse] = await Promise.all([
      this.searchOrNull(`site:google.com/maps "${businessName}" OR "${domain}" reviews`, signal, logger),
      this.searchOrNull(`site:trustpilot.com "${domain}"`, signal, logger),
      this.searchOrNull(
        `"${domain}" reviews opinions buying experience -"${domainBase}.com"`,
        signal,
        logger,
      ),
    ])

    const mapsReviews: Review[] = []
    for (const result of mapsResponse?.results ?? []) {
      const url = result.url.toLowerCase()
      if (mentionsOtherTld(result.snippet.toLowerCase(), domainBase, domainTld)) {
        continue
      }
      if (url.includes("support.google.com") || url.includes("help.google.com")) {
        continue
      }
      if (result.snippet.length > MIN_SNIPPET_CHARS) {
        mapsReviews.push(toReview(result, labelSource(url), "Google review"))
      }
    }

    const trustpilotReviews: Review[] = []
    let trustpilotRating: number | null = null
    let trustpilotUrl: string | null = null
    for (const result of trustpilotResponse?.results ?? []) {
      const url = result.url.toLowerCase()
      if (!url.includes("trustpilot.com")) {
        continue
      }

      const urlHasDomain = url.includes(domain)
      const text = `${result.snippet} ${result.title}`.toLowerCase()
      const wrongDomain =
        !urlHasDomain &&
        OTHER_TLDS.some((tld) => {
          if (tld === domainTld) {
            return false
          }
          const other = `${domainBase}${tld}`
          return url.includes(other) || text.includes(`reviews of ${other}`) || url.includes(`review/${other}`)
        })
      if (wrongDomain || !(urlHasDomain || text.includes(domain))) {
        continue
      }

      if (!trustpilotUrl || urlHasDomain) {
        trustpilotUrl = result.url
      }

      const rating = TRUSTPILOT_RATING.exec(result.snippet)
      if (rating?.[1] && trustpilotRating === null) {
        trustpilotRating = Number.parseFloat(rating[1].replace(",", "."))
      }

      if (result.snippet.length > MIN_SNIPPET_CHARS) {
        trustpilotReviews.push(toReview(result, "Trustpilot", "Trustpilot review"))
      }
    }

    const generalReviews: Review[] = []
    for (const result of generalResponse?.results ?? []) {
      const url = result.url.toLowerCase()
      if (url.includes("trustpilot.com")) {
        continue
      }
      const text = `${result.snippet} ${result.title}`.toLowerCase()
      if (!text.includes(domain) && mentionsOtherTld(text, domainBase, domainTld)) {
        continue
      }
      if (result.snippet.length > MIN_SNIPPET_CHARS) {
        generalReviews.push(toReview(result, labelSource(url), "Review"))
      }
    }

    const reviews = dedupeByUrl([...trustpilotReviews, ...mapsReviews, ...generalReviews])
    const summary = await this.summarize(reviews, businessName, domain, signal, logger)
    const sentiment = summary?.sentiment ?? 50
    const trustAssessment = summary?.trust_assessment ?? "neutral"

    if (sentiment >= 70) {
      findings.add("info", `Positive online reputation (score: ${sentiment}/100).`, -5)
    } else if (sentiment <= 30) {
      findings.add("warning", `Negative online reputation (score: ${sentiment}/100).`, 10)
    }

    if (trustpilotRating !== null) {
      if (trustpilotRating >= 4) {
        findings.add("info", `Trustpilot: ${trustpilotRating}/5 stars.`)
      } else if (trustpilotRating < 2.5) {
        findings.add("warning", `Trustpilot: ${trustpilotRating}/5 stars (low).`)
      }
    }

    if (trustAssessment === "suspicious") {
      findings.add("warning", "Reviews suggest caution with this site.")
    } else if (trustAssessment === "trustworthy") {
      findings.add("info", "Reviews suggest this site is trustworthy.")
    }

    if (reviews.length === 0) {
      findings.add("warning", "No online reviews were found for this business.")
    } else {
      const sources = [...new Set(reviews.map((review) => review.source))]
      findings.add("info", `Found ${reviews.length} reviews from ${sources.join(", ")}.`)
    }

    findings
      .set("reviews_checked", true)
      .set("business_name", businessName)
      .set("domain", domain)
      .set("trustpilot_rating", trustpilotRating)
      .set("trustpilot_url", trustpilotUrl)
      .set("review_summary", summary?.summary ?? null)
      .set("sentiment_score", sentiment)
      .set("trust_assessment", trustAssessment)
      .set("key_positives", summary?.key_positives.slice(0, 3) ?? [])
      .set("key_negatives", summary?.key_negatives.slice(0, 3) ?? [])
      .set("reviews_count", reviews.length)
      .set("reviews", reviews.slice(0, DISPLAYED_REVIEWS))

    return findings.finish()
  }

  private async searchOrNull(
    query: string,
    signal: AbortSignal,
    logger: pino.Logger,
  ): Promise<SearchExecution | null> {
    try {
      const execution = await this.search.search({ query, count: RESULTS_PER_SEARCH, signal })
      logger.debug({ query, provider: execution.provider, results: execution.results.length }, "review search")
      return execution
    } catch (error) {
      signal.throwIfAborted()
      logger.warn({ error, query }, "review search failed")
      return null
    }
  }

  private async summarize(
    reviews: Review[],
    businessName: string,
    domain: string,
    signal: AbortSignal,
    logger: pino.Logger,
  ): Promise<ReputationSummary | null> {
    if (reviews.length < MIN_REVIEWS_FOR_SUMMARY || !this.llm.enabled) {
      return null
    }

    const reviewsText = reviews
      .slice(0, 10)
      .map((review) => `[${review.source}] ${review.title}: ${review.content}`)
      .join("\n\n")

    try {
      return await this.llm.generate({
        schema: ReputationSummarySchema,
        system: "You are a business reputation analyst. Assess reviews objectively.",
        prompt: `Analyze the following reviews and opinions about "${businessName}" (${domain}):\n\n${reviewsText}`,
        signal,
      })
    } catch (error) {
      signal.throwIfAborted()
      logger.warn({ error }, "review summary failed; using neutral sentiment")
      return null
    }
  }
}

function dedupeByUrl(reviews: Review[]): Review[] {
  const seen = new Set<string>()
  return reviews.filter((review) => {
    const key = review.url.toLowerCase()
    if (seen.has(key)) {
      return false
    }
    seen.add(key)
    return true
  })
}
