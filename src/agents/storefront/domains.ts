/** Hostname without a leading "www.", or the raw input when it does not parse as a URL. */
export function extractDomain(url: string): string {
  let host: string
  try {
    host = new URL(url).hostname
  } catch {
    host = url
  }
  host = host.toLowerCase()
  return host.startsWith("www.") ? host.slice(4) : host
}
