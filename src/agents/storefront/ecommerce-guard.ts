import { z } from "zod"
import type { StorefrontRequest } from "../../schemas"
import type { StructuredLlm } from "../../services/llm-client"
import type { AgentResult } from "../../types"
import type { Agent, AgentContext } from "../agent"
import { Findings } from "../agent"

const HTML_EXCERPT_CHARS = 12_000

const GuardAnalysisSchema = z.object({
  visual: z.object({
    phishing_detected: z
      .boolean()
      .describe("True if the page visually mimics a known brand while the URL belongs to someone else."),
    phishing_reasoning: z.string(),
    purchase_button_present: z
      .boolean()
      .describe("True if a working 'Buy', 'Add to cart' or similar control is visible."),
    purchase_reasoning: z.string(),
  }),
  html: z.object({
    iframe_risk_detected: z
      .boolean()
      .describe("True if iframes lack a sandbox or are overly permissive."),
    iframe_reasoning: z.string(),
    csrf_risk_detected: z
      .boolean()
      .describe("True if login or payment forms lack CSRF protection."),
    csrf_reasoning: z.string(),
  }),
  price: z.object({
    suspiciously_low_price: z
      .boolean()
      .describe("True if the price is absurdly low for the product described."),
    reasoning: z.string(),
  }),
})

export type GuardAnalysis = z.infer<typeof GuardAnalysisSchema>

const SYSTEM_PROMPT = [
  "You are an e-commerce security expert reviewing a single product page.",
  "Analyze visuals, HTML structure and pricing together to detect scams, phishing or vulnerabilities.",
].join(" ")

export class EcommerceGuardAgent implements Agent<StorefrontRequest> {
  readonly name = "ecommerce_guard"
  readonly role = "verdict" as const

  constructor(private readonly llm: StructuredLlm) {}

  async run(request: StorefrontRequest, { signal, logger }: AgentContext): Promise<AgentResult> {
    const findings = new Findings()
    const hasScreenshot = Boolean(request.screenshot_base64)
    findings.set("screenshot_provided", hasScreenshot)

    if (!this.llm.enabled) {
      findings.add("info", "Security analysis skipped: no LLM provider is configured.")
      findings.set("checked", false)
      return findings.finish()
    }

    const analysis = await this.llm.generate({
      schema: GuardAnalysisSchema,
      system: SYSTEM_PROMPT,
      prompt: buildPrompt(request, hasScreenshot),
      imageBase64: request.screenshot_base64,
      signal,
    })

    findings.set("checked", true)
    const verdict = scoreAnalysis(findings, analysis, hasScreenshot)
    findings.impact = Math.min(100, findings.impact)

    logger.debug({ scoreImpact: findings.impact, flags: findings.flags.length }, "guard analysis complete")
    return findings.finish(verdict)
  }
}

/** Applies guard scoring to `findings` and returns a verdict when phishing was detected. */
export function scoreAnalysis(
  findings: Findings,
  analysis: GuardAnalysis,
  hasScreenshot: boolean,
): { title: string; message: string } | undefined {
  let purchaseActive = false
  let verdict: { title: string; message: string } | undefined

  if (hasScreenshot) {
    findings.set("visual_analysis", analysis.visual)
    if (analysis.visual.phishing_detected) {
      findings.add("critical", `Possible phishing detected: ${analysis.visual.phishing_reasoning}`, 100)
      verdict = {
        title: "Possible phishing site",
        message: analysis.visual.phishing_reasoning,
      }
    } else {
      findings.add("info", "No obvious visual phishing detected.")
    }

    if (analysis.visual.purchase_button_present) {
      purchaseActive = true
      findings.add("info", "Purchase button detected.")
    } else {
      findings.add("warning", "No active purchase button detected.")
    }
  } else {
    findings.add("warning", "Visual analysis skipped: no screenshot was provided.")
  }

  // Frame and form risks weigh more once a purchase can actually happen.
  const severity = purchaseActive ? "critical" : "warning"
  const htmlImpact = purchaseActive ? 20 : 10
  findings.set("html_security", analysis.html)

  if (analysis.html.iframe_risk_detected) {
    findings.add(severity, `Iframe risk: ${analysis.html.iframe_reasoning}`, htmlImpact)
  } else {
    findings.add("info", "Iframes are safe or absent.")
  }

  if (analysis.html.csrf_risk_detected) {
    findings.add(severity, `Missing CSRF protection: ${analysis.html.csrf_reasoning}`, htmlImpact)
  } else {
    findings.add("info", "Forms are safe or absent.")
  }

  findings.set("price_analysis", analysis.price)
  if (analysis.price.suspiciously_low_price) {
    findings.add("critical", `Suspiciously low price: ${analysis.price.reasoning}`, 40)
  } else {
    findings.add("info", `Price analysis: ${analysis.price.reasoning}`)
  }

  return verdict
}

function buildPrompt(request: StorefrontRequest, hasScreenshot: boolean): string {
  const metadata: Array<[string, string | number | undefined]> = [
    ["title", request.title],
    ["meta description", request.meta_description],
    ["protocol", request.protocol],
    ["scripts", request.scripts],
    ["external scripts", request.external_scripts],
    ["forms", request.forms],
    ["iframes", request.iframes],
    ["images", request.images],
  ]
  if (request.links) {
    metadata.push([
      "links",
      `${request.links.total} total, ${request.links.internal} internal, ${request.links.external} external`,
    ])
  }

  const metadataLines = metadata
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== "")
    .map(([label, value]) => `${label}: ${value}`)

  const html = request.html_content.trim()

  return [
    `Analyze the web page hosted at '${request.url}'.`,
    "=== PAGE METADATA ===",
    metadataLines.length > 0 ? metadataLines.join("\n") : "No metadata collected.",
    "=== HTML ===",
    html ? html.slice(0, HTML_EXCERPT_CHARS) : "No HTML collected.",
    [
      "Perform a security analysis covering:",
      "1. Visual phishing (logo or layout mimicry)",
      "2. Purchase validation (visible buy buttons)",
      "3. HTML risks (iframes, CSRF)",
      "4. Price logic (too good to be true)",
    ].join("\n"),
    hasScreenshot
      ? "A screenshot of the page is attached."
      : "No screenshot is provided: set the visual fields to false.",
  ].join("\n\n")
}
