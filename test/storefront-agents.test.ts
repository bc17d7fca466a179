import { describe, expect, test } from "vitest"
import { Findings } from "../src/agents/agent"
import { extractDomain } from "../src/agents/storefront/domains"
import { EcommerceGuardAgent, scoreAnalysis } from "../src/agents/storefront/ecommerce-guard"
import type { GuardAnalysis } from "../src/agents/storefront/ecommerce-guard"
import {
  extractPriceFallback,
  extractProductName,
  formatPrice,
  PriceComparisonAgent,
} from "../src/agents/storefront/price-comparison"
import { extractBusinessName, ReviewsAgent } from "../src/agents/storefront/reviews"
import { StorefrontRequestSchema } from "../src/schemas"
import type { StorefrontRequest } from "../src/schemas"
import { agentContext, FakeLlm, FakeSearch, result } from "./helpers"

function storefront(overrides: Record<string, unknown> = {}): StorefrontRequest {
  return StorefrontRequestSchema.parse({
    url: "https://www.acmeshoes.cl/product/1",
    html_content: "<html><body><form action='/cart'></form></body></html>",
    title: "Trail Runner X | AcmeShoes Chile",
    ...overrides,
  })
}

function analysis(overrides: {
  phishing?: boolean
  purchase?: boolean
  iframe?: boolean
  csrf?: boolean
  lowPrice?: boolean
}): GuardAnalysis {
  return {
    visual: {
      phishing_detected: overrides.phishing ?? false,
      phishing_reasoning: "logo copied from a bank",
      purchase_button_present: overrides.purchase ?? false,
      purchase_reasoning: "add to cart visible",
    },
    html: {
      iframe_risk_detected: overrides.iframe ?? false,
      iframe_reasoning: "unsandboxed payment frame",
      csrf_risk_detected: overrides.csrf ?? false,
      csrf_reasoning: "no token on checkout form",
    },
    price: {
      suspiciously_low_price: overrides.lowPrice ?? false,
      reasoning: "price in line with the category",
    },
  }
}

describe("ecommerce guard agent", () => {
  test("reports a skipped check when no LLM is configured", async () => {
    const llm = new FakeLlm(false)
    const output = await new EcommerceGuardAgent(llm).run(storefront(), agentContext())

    expect(output).toEqual({
      flags: [{ severity: "info", message: "Security analysis skipped: no LLM provider is configured." }],
      details: { screenshot_provided: false, checked: false },
      scoreImpact: 0,
    })
    expect(llm.calls).toHaveLength(0)
  })

  test("weighs frame risks as critical once a purchase button is present", async () => {
    const llm = new FakeLlm(true, [analysis({ purchase: true, iframe: true })])
    const output = await new EcommerceGuardAgent(llm).run(
      storefront({ screenshot_base64: "aW1hZ2U=" }),
      agentContext(),
    )

    expect(output.flags).toEqual([
      { severity: "info", message: "No obvious visual phishing detected." },
      { severity: "info", message: "Purchase button detected." },
      { severity: "critical", message: "Iframe risk: unsandboxed payment frame" },
      { severity: "info", message: "Forms are safe or absent." },
      { severity: "info", message: "Price analysis: price in line with the category" },
    ])
    expect(output.scoreImpact).toBe(20)
    expect(output.verdictTitle).toBeUndefined()
    expect(llm.calls[0]?.imageBase64).toBe("aW1hZ2U=")
    expect(llm.calls[0]?.prompt).toContain("Analyze the web page hosted at 'https://www.acmeshoes.cl/product/1'.")
  })

  test("caps the deduction and returns a phishing verdict", async () => {
    const llm = new FakeLlm(true, [
      analysis({ phishing: true, purchase: true, iframe: true, csrf: true, lowPrice: true }),
    ])
    const output = await new EcommerceGuardAgent(llm).run(
      storefront({ screenshot_base64: "aW1hZ2U=" }),
      agentContext(),
    )

    expect(output.scoreImpact).toBe(100)
    expect(output.verdictTitle).toBe("Possible phishing site")
    expect(output.verdictMessage).toBe("logo copied from a bank")
  })

  test("ignores visual fields without a screenshot", () => {
    const findings = new Findings()
    const verdict = scoreAnalysis(findings, analysis({ phishing: true, csrf: true }), false)

    expect(verdict).toBeUndefined()
    expect(findings.flags.slice(0, 3)).toEqual([
      { severity: "warning", message: "Visual analysis skipped: no screenshot was provided." },
      { severity: "info", message: "Iframes are safe or absent." },
      { severity: "warning", message: "Missing CSRF protection: no token on checkout form" },
    ])
    expect(findings.impact).toBe(10)
    expect(findings.details.visual_analysis).toBeUndefined()
  })

  test("lets LLM failures reach the runner", async () => {
    const llm = new FakeLlm(true, [new Error("model overloaded")])
    await expect(new EcommerceGuardAgent(llm).run(storefront(), agentContext())).rejects.toThrow(
      "model overloaded",
    )
  })
})

describe("reviews agent", () => {
  const summary = {
    summary: "Customers are happy with delivery times.",
    sentiment: 82,
    key_positives: ["fast delivery"],
    key_negatives: [],
    trust_assessment: "trustworthy",
  }

  const search = new FakeSearch(true, (request) => {
    if (request.query.startsWith("site:trustpilot.com")) {
      return [
        result(
          "https://www.trustpilot.com/review/acmeshoes.cl",
          "AcmeShoes Reviews",
          "Rated 4.3 out of 5 based on 120 reviews. Customers praise fast delivery and sizing help.",
        ),
      ]
    }
    if (request.query.startsWith("site:google.com/maps")) {
      return [
        result(
          "https://www.google.com/maps/place/acmeshoes",
          "AcmeShoes",
          "Great store with friendly staff, my order from acmeshoes.cl arrived in two days.",
        ),
      ]
    }
    return [
      result(
        "https://blog.test/acmeshoes-review",
        "Buying from acmeshoes.cl",
        "I bought running shoes from acmeshoes.cl last month and the whole experience was smooth.",
      ),
      result(
        "https://forum.test/thread/1",
        "Shoe shops",
        "acmeshoes.com is a completely different company that sells furniture, not shoes at all.",
      ),
    ]
  })

  test("collects reviews from every source and summarises them", async () => {
    const llm = new FakeLlm(true, [summary])
    const output = await new ReviewsAgent(search, llm).run(storefront(), agentContext())

    expect(search.calls.map((call) => call.query)).toEqual([
      'site:google.com/maps "AcmeShoes" OR "acmeshoes.cl" reviews',
      'site:trustpilot.com "acmeshoes.cl"',
      '"acmeshoes.cl" reviews opinions buying experience -"acmeshoes.com"',
    ])
    expect(output.flags).toEqual([
      { severity: "info", message: "Positive online reputation (score: 82/100)." },
      { severity: "info", message: "Trustpilot: 4.3/5 stars." },
      { severity: "info", message: "Reviews suggest this site is trustworthy." },
      { severity: "info", message: "Found 3 reviews from Trustpilot, Google Maps, Web." },
    ])
    expect(output.scoreImpact).toBe(0)
    expect(output.details).toMatchObject({
      reviews_checked: true,
      business_name: "AcmeShoes",
      domain: "acmeshoes.cl",
      trustpilot_rating: 4.3,
      trustpilot_url: "https://www.trustpilot.com/review/acmeshoes.cl",
      sentiment_score: 82,
      reviews_count: 3,
    })
  })

  test("warns when nothing is found and search keeps failing", async () => {
    const failing = new FakeSearch(true, () => new Error("quota exceeded"))
    const llm = new FakeLlm(true)
    const output = await new ReviewsAgent(failing, llm).run(storefront(), agentContext())

    expect(output.flags).toEqual([
      { severity: "warning", message: "No online reviews were found for this business." },
    ])
    expect(output.details.sentiment_score).toBe(50)
    expect(llm.calls).toHaveLength(0)
  })

  test("skips entirely when search is disabled", async () => {
    const output = await new ReviewsAgent(new FakeSearch(false), new FakeLlm(true)).run(
      storefront(),
      agentContext(),
    )

    expect(output).toEqual({
      flags: [{ severity: "info", message: "Review search skipped: web search is disabled." }],
      details: { reviews_checked: false },
      scoreImpact: 0,
    })
  })

  test("derives a business name from the title or the domain", () => {
    expect(extractBusinessName("https://www.acmeshoes.cl", "Trail Runner X | AcmeShoes Chile")).toBe("AcmeShoes")
    expect(extractBusinessName("https://www.acmeshoes.cl")).toBe("Acmeshoes")
    expect(extractDomain("https://WWW.Shop.test/a")).toBe("shop.test")
    expect(extractDomain("not a url")).toBe("not a url")
  })
})

describe("price comparison agent", () => {
  const settings = { region: "", installmentFloor: 50_000 }

  test("compares against other stores with LLM and pattern extraction", async () => {
    const search = new FakeSearch(true, () => [
      result("https://www.acmeshoes.cl/other", "Trail Runner X", "Our own listing at $99.990"),
      result("https://rivalshop.test/p/9", "Trail Runner X", "Trail Runner X now $89.990, before $109.990"),
      result("https://rivalshop.test/p/10", "Trail Runner X blue", "Trail Runner X blue $91.990"),
      result("https://nopricestore.test/x", "Trail Runner X", "Great shoes for trail running"),
      result("https://thirdshop.test/y", "Trail Runner X", "Only $79.990 or 12 payments of $6.666"),
    ])
    const llm = new FakeLlm(true, [
      { current_price: 89990, currency: "CLP", is_installment: false, confidence: 90 },
      { current_price: 6666, currency: "CLP", is_installment: true, confidence: 80 },
    ])

    const output = await new PriceComparisonAgent(search, llm, settings).run(
      storefront({ title: "Trail Runner X | AcmeShoes" }),
      agentContext(),
    )

    expect(search.calls[0]?.query).toBe('buy "Trail Runner X" price')
    expect(search.calls[0]?.count).toBe(20)
    expect(output.flags).toEqual([
      {
        severity: "info",
        message: "This product is also sold by 2 other stores. Compare prices before buying.",
      },
    ])
    expect(output.scoreImpact).toBe(0)
    expect(output.details.comparisons).toEqual([
      {
        store: "rivalshop.test",
        title: "Trail Runner X",
        price_text: "$89.990",
        price_numeric: 89990,
        url: "https://rivalshop.test/p/9",
        extraction_method: "llm",
        confidence: 90,
      },
      {
        store: "thirdshop.test",
        title: "Trail Runner X",
        price_text: "$79.990",
        price_numeric: 79990,
        url: "https://thirdshop.test/y",
        extraction_method: "regex_fallback",
        confidence: 30,
      },
    ])
  })

  test("skips without a usable product name", async () => {
    const search = new FakeSearch(true)
    const output = await new PriceComparisonAgent(search, new FakeLlm(false), settings).run(
      storefront({ title: "X" }),
      agentContext(),
    )

    expect(output.flags).toEqual([
      { severity: "info", message: "Price comparison skipped: no product name could be determined." },
    ])
    expect(search.calls).toHaveLength(0)
  })

  test("extracts names and fallback prices", () => {
    expect(extractProductName("Trail Runner X - Acme")).toBe("Trail Runner X")
    expect(extractProductName(undefined)).toBe("")
    expect(extractPriceFallback("12 x $12.990 or $155.880 cash", 50_000)).toBe(155880)
    expect(extractPriceFallback("only $12.990 monthly", 50_000)).toBeNull()
    expect(formatPrice(269990)).toBe("$269.990")
  })
})
