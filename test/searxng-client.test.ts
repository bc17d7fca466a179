import { describe, expect, test } from "vitest"
import { loadConfig } from "../src/config"
import { SearxngClient } from "../src/services/searxng-client"

function searxngSettings(env: Record<string, string> = {}) {
  return loadConfig(env).searxng
}

describe("searxng client", () => {
  test("maps JSON results and trims to requested count", async () => {
    let requestedUrl = ""

    const client = new SearxngClient(
      searxngSettings({ SHOPWARDEN_SEARXNG_BASE_URL: "https://search.test/" }),
      {
        fetchImpl: async (input) => {
          requestedUrl = String(input)
          return new Response(
            JSON.stringify({
              results: [
                {
                  url: "https://shop.test/one",
                  title: "One",
                  content: "Snippet one",
                  publishedDate: "2026-01-01",
                },
                {
                  url: "https://shop.test/two",
                  title: "Two",
                  content: "Snippet two",
                },
              ],
            }),
            {
              status: 200,
              headers: { "content-type": "application/json" },
            },
          )
        },
      },
    )

    const results = await client.search({ query: "trail shoes", count: 1 })

    const requested = new URL(requestedUrl)
    expect(requested.origin + requested.pathname).toBe("https://search.test/search")
    expect(requested.searchParams.get("q")).toBe("trail shoes")
    expect(requested.searchParams.get("format")).toBe("json")
    expect(requested.searchParams.get("safesearch")).toBe("1")

    expect(results).toEqual([
      {
        url: "https://shop.test/one",
        title: "One",
        snippet: "Snippet one",
        source: "shop.test",
        published: "2026-01-01",
      },
    ])
  })

  test("falls back to the description and skips entries without a url", async () => {
    const client = new SearxngClient(searxngSettings({ SHOPWARDEN_SEARXNG_BASE_URL: "https://search.test" }), {
      fetchImpl: async () =>
        new Response(
          JSON.stringify({
            results: [{ title: "No url" }, { url: "https://shop.test/a", description: "From description" }],
          }),
          { status: 200 },
        ),
    })

    const results = await client.search({ query: "x", count: 5 })
    expect(results).toEqual([
      {
        url: "https://shop.test/a",
        title: "Untitled",
        snippet: "From description",
        source: "shop.test",
        published: undefined,
      },
    ])
  })

  test("throws when searxng URL is not configured", async () => {
    const client = new SearxngClient(searxngSettings())
    await expect(client.search({ query: "x", count: 1 })).rejects.toThrow(
      "SHOPWARDEN_SEARXNG_BASE_URL is not configured",
    )
  })
})
