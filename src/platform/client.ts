import { PlatformRequestError } from "./errors.js"

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>

export type QueryValue = string | number | boolean | string[] | null | undefined

export type PlatformClient = {
  getJson: (endpoint: string, query?: Record<string, QueryValue>) => Promise<unknown>
}

type PlatformClientInput = {
  baseUrl: string
  apiKey: string | null
  timeoutMs: number
  fetchImpl?: FetchLike
}

const buildUrl = (baseUrl: string, endpoint: string, query: Record<string, QueryValue>): URL => {
  const url = new URL(`${baseUrl}${endpoint}`)

  for (const [key, value] of Object.entries(query)) {
    if (value == null) {
      continue
    }

    if (Array.isArray(value)) {
      for (const entry of value) {
        url.searchParams.append(key, entry)
      }
      continue
    }

    url.searchParams.set(key, String(value))
  }

  return url
}

const classifyFetchFailure = (error: unknown, endpoint: string, timeoutMs: number): Error => {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new PlatformRequestError(
      "timeout",
      `Platform request to ${endpoint} timed out after ${timeoutMs}ms`
    )
  }

  if (error instanceof TypeError) {
    return new PlatformRequestError(
      "connection",
      `Cannot reach platform API for ${endpoint} (${error.message})`
    )
  }

  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Thin JSON-over-HTTP client for the platform REST API. Every request carries the
 * credential and a per-request timeout; failures are reported as `PlatformRequestError`
 * so callers can tell HTTP status, timeout and connection problems apart.
 *
 * @param input Base URL, credential, timeout and an optional fetch override for tests.
 */
export const createPlatformClient = (input: PlatformClientInput): PlatformClient => {
  const fetchImpl: FetchLike = input.fetchImpl ?? fetch
  const headers: Record<string, string> = {
    accept: "application/json",
  }
  if (input.apiKey) {
    headers.authorization = `Key ${input.apiKey}`
  }

  return {
    getJson: async (endpoint, query = {}) => {
      const url = buildUrl(input.baseUrl, endpoint, query)

      let response: Response
      try {
        response = await fetchImpl(url, {
          method: "GET",
          headers,
          signal: AbortSignal.timeout(input.timeoutMs),
        })
      } catch (error) {
        throw classifyFetchFailure(error, endpoint, input.timeoutMs)
      }

      if (!response.ok) {
        throw new PlatformRequestError(
          "http_status",
          `Platform request to ${endpoint} failed (${response.status})`,
          response.status
        )
      }

      const text = await response.text()
      if (text.length === 0) {
        return {}
      }

      try {
        const body: unknown = JSON.parse(text)
        return body
      } catch {
        throw new PlatformRequestError(
          "invalid_payload",
          `Platform returned non-JSON payload for ${endpoint}`
        )
      }
    },
  }
}
