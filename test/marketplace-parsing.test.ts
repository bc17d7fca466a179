import { describe, expect, test } from "vitest"
import {
  formatAmount,
  parseJoinYear,
  parseListingsCount,
  parsePostedDays,
  parsePrice,
} from "../src/agents/marketplace/parsing"

describe("marketplace parsing", () => {
  test("reads join years", () => {
    expect(parseJoinYear("Joined Facebook in 2019")).toBe(2019)
    expect(parseJoinYear("Se unió en 2021")).toBe(2021)
    expect(parseJoinYear("recently")).toBeNull()
    expect(parseJoinYear(undefined)).toBeNull()
  })

  test("converts posting age to days", () => {
    expect(parsePostedDays("Listed 3 hours ago")).toBe(0)
    expect(parsePostedDays("Publicado ayer")).toBe(1)
    expect(parsePostedDays("hace 3 días")).toBe(3)
    expect(parsePostedDays("Listed 2 weeks ago")).toBe(14)
    expect(parsePostedDays("hace 2 meses")).toBe(60)
    expect(parsePostedDays("a while back")).toBeNull()
  })

  test("parses display prices with either thousands separator", () => {
    expect(parsePrice("$1,500")).toBe(1500)
    expect(parsePrice("$269.990")).toBe(269990)
    expect(parsePrice("1,234,567")).toBe(1234567)
    expect(parsePrice("90 000 $")).toBe(90000)
    expect(parsePrice("$12.50")).toBe(12.5)
    expect(parsePrice("Free")).toBe(0)
    expect(parsePrice("Gratis!")).toBe(0)
    expect(parsePrice("Ask me")).toBeNull()
    expect(parsePrice(undefined)).toBeNull()
  })

  test("reads listing counts and formats amounts", () => {
    expect(parseListingsCount("20+")).toBe(20)
    expect(parseListingsCount("5 publicaciones")).toBe(5)
    expect(parseListingsCount("none")).toBeNull()
    expect(formatAmount(1000)).toBe("$1,000")
    expect(formatAmount(999.6)).toBe("$1,000")
  })
})
