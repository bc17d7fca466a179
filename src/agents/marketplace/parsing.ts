// Marketplace pages are scraped in English or Spanish, so the keyword sets below carry both.

const JUST_NOW = ["just now", "ahora", "recién"]
const SAME_DAY = ["hour", "minute", "hora", "minuto"]
const YESTERDAY = ["yesterday", "ayer"]

/** Year from strings such as "Joined in 2019" or "Se unió en 2019". */
export function parseJoinYear(joinDate?: string): number | null {
  if (!joinDate) {
    return null
  }

  const match = /(19|20)\d{2}/.exec(joinDate)
  return match ? Number.parseInt(match[0], 10) : null
}

/** Age in days from strings such as "Listed 2 days ago" or "hace 3 semanas". */
export function parsePostedDays(postedDate?: string): number | null {
  if (!postedDate) {
    return null
  }

  const text = postedDate.toLowerCase()
  if (JUST_NOW.some((term) => text.includes(term)) || SAME_DAY.some((term) => text.includes(term))) {
    return 0
  }
  if (YESTERDAY.some((term) => text.includes(term))) {
    return 1
  }

  const days = /(\d+)\s*(day|día|dia)/.exec(text)
  if (days?.[1]) {
    return Number.parseInt(days[1], 10)
  }

  const weeks = /(\d+)\s*(week|semana)/.exec(text)
  if (weeks?.[1]) {
    return Number.parseInt(weeks[1], 10) * 7
  }

  const months = /(\d+)\s*(month|mes)/.exec(text)
  if (months?.[1]) {
    return Number.parseInt(months[1], 10) * 30
  }

  return null
}

/**
 * Numeric price from display strings such as "$1,500", "90 000 $", "$269.990"
 * or "Free". Dot- or comma-grouped thousands are both accepted.
 */
export function parsePrice(price?: string): number | null {
  if (!price) {
    return null
  }

  const lower = price.toLowerCase()
  if (lower.includes("free") || lower.includes("gratis")) {
    return 0
  }

  const cleaned = price.replace(/\s+/g, "").replace(/[^\d.,]/g, "")
  if (!cleaned) {
    return null
  }

  const normalized = /^\d{1,3}([.,]\d{3})+$/.test(cleaned)
    ? cleaned.replace(/[.,]/g, "")
    : cleaned.replace(/,/g, "")

  const value = Number.parseFloat(normalized)
  return Number.isFinite(value) ? value : null
}

/** Leading number of a listings count such as "20+" or "5 publicaciones". */
export function parseListingsCount(listings?: string): number | null {
  if (!listings) {
    return null
  }

  const match = /(\d+)/.exec(listings)
  return match?.[1] ? Number.parseInt(match[1], 10) : null
}

export function formatAmount(value: number): string {
  return `$${Math.round(value).toLocaleString("en-US")}`
}
