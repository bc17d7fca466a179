export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
  })
}

export function errorResponse(status: number, message: string, details?: unknown): Response {
  return jsonResponse(
    {
      error: {
        message,
        details,
      },
    },
    status,
  )
}

/** Parsed JSON body, or `null` when the body is missing or not JSON. */
export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    return null
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const CORS_ALLOW_METHODS = "GET, POST, OPTIONS"
const CORS_ALLOW_HEADERS = "content-type"

export function withCors(response: Response, origin: string): Response {
  response.headers.set("access-control-allow-origin", origin)
  response.headers.set("access-control-allow-methods", CORS_ALLOW_METHODS)
  response.headers.set("access-control-allow-headers", CORS_ALLOW_HEADERS)
  if (origin !== "*") {
    response.headers.set("vary", "origin")
  }
  return response
}

export function preflightResponse(): Response {
  return new Response(null, { status: 204 })
}
