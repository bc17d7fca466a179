import type { MarketplaceRequest } from "../../schemas"
import type { AgentResult } from "../../types"
import type { Agent } from "../agent"
import { Findings } from "../agent"

const VAGUE_PATTERNS: Array<[RegExp, string]> = [
  [/contacta?r?\s*(para|for)\s*(más|more|m[aá]s)\s*(info|información|details)/, 'Vague wording: "contact for more info".'],
  [/pregunt[ae]r?\s*(por|for)/, 'Vague wording: "ask for details".'],
  [/no\s+preguntas?\s+tontas?/, "Hostile wording towards buyers."],
  [/solo\s+interesados?/, "Filters out buyers up front."],
]

const SPECIFICITY_PATTERNS: Array<[RegExp, string]> = [
  [/\b\d+\s*(gb|tb|inch|pulgadas?|cm|mm|kg|lb)\b/, "specs"],
  [/\b(modelo|model|serie|series)\s*:?\s*\w+/, "model"],
  [/\b(marca|brand)\s*:?\s*\w+/, "brand"],
  [/\b\d{4}\b/, "year"],
  [/(^|[^\p{L}])(original|auténtico|genuine|authentic)($|[^\p{L}])/u, "authenticity"],
  [/(^|[^\p{L}])(garant[ií]a|warranty)($|[^\p{L}])/u, "warranty"],
  [/\b(factura|receipt|invoice)\b/, "receipt"],
]

const REPEATED_PUNCTUATION = /[!?]{2,}/g
const EMOJI = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}]/gu

function uppercaseRatio(text: string): number {
  let upper = 0
  for (const char of text) {
    if (char !== char.toLowerCase() && char === char.toUpperCase()) {
      upper += 1
    }
  }
  return upper / Math.max(text.length, 1)
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export class DescriptionQualityAgent implements Agent<MarketplaceRequest> {
  readonly name = "description_quality"

  async run(request: MarketplaceRequest): Promise<AgentResult> {
    const findings = new Findings()
    const description = request.listing?.description ?? ""
    const title = request.listing?.title ?? ""
    const length = description.length

    findings.set("has_description", description.trim().length > 0).set("description_length", length)

    if (!description.trim()) {
      findings.add("warning", "Listing has no description.", 15)
      return findings.set("quality_score", 0).finish()
    }

    if (length < 20) {
      findings.add("warning", "Very short description (under 20 characters).", 10)
      findings.set("length_rating", "very_short")
    } else if (length < 50) {
      findings.adjust(5).set("length_rating", "short")
    } else if (length >= 150) {
      findings.adjust(-5).set("length_rating", "detailed")
    } else {
      findings.set("length_rating", "adequate")
    }

    const upperRatio = uppercaseRatio(description)
    findings.set("uppercase_ratio", roundTo(upperRatio, 2))
    if (upperRatio > 0.5 && length > 20) {
      findings.add("warning", "Description is mostly in capital letters.", 5)
    }

    const punctuationRuns = description.match(REPEATED_PUNCTUATION)?.length ?? 0
    const emojiCount = description.match(EMOJI)?.length ?? 0
    findings.set("excessive_punctuation", punctuationRuns).set("emoji_count", emojiCount)
    if (punctuationRuns > 3) {
      findings.adjust(3)
    }

    const lower = description.toLowerCase()
    for (const [pattern, message] of VAGUE_PATTERNS) {
      if (pattern.test(lower)) {
        findings.add("info", message, 2)
      }
    }

    const specifics = SPECIFICITY_PATTERNS.filter(([pattern]) => pattern.test(lower)).map(([, kind]) => kind)
    findings.set("specific_details", specifics).set("specificity_count", specifics.length)
    if (specifics.length >= 3) {
      findings.add("info", `Description includes specific details (${specifics.slice(0, 3).join(", ")}).`, -5)
    }

    const titleWords = new Set(title.toLowerCase().split(/\s+/).filter(Boolean))
    const descriptionWords = new Set(lower.split(/\s+/).filter(Boolean))
    const shared = [...titleWords].filter((word) => descriptionWords.has(word)).length
    findings.set("title_description_relevance", roundTo(shared / Math.max(titleWords.size, 1), 2))

    const quality = 50 + Math.min(length / 5, 20) + specifics.length * 5 - findings.impact
    findings.set("quality_score", Math.round(Math.max(0, Math.min(100, quality))))

    return findings.finish()
  }
}
