export type PlatformRequestErrorCode = "http_status" | "timeout" | "connection" | "invalid_payload"

export class PlatformRequestError extends Error {
  code: PlatformRequestErrorCode
  statusCode: number | null

  constructor(code: PlatformRequestErrorCode, message: string, statusCode: number | null = null) {
    super(message)
    this.name = "PlatformRequestError"
    this.code = code
    this.statusCode = statusCode
  }
}

/**
 * Short, user-facing label for a failed platform request, used when search results are
 * served from the local catalog instead.
 */
export const describePlatformFailure = (error: unknown): string => {
  if (!(error instanceof PlatformRequestError)) {
    return "Unexpected error"
  }

  if (error.code === "http_status") {
    return `API error (HTTP ${error.statusCode ?? "unknown"})`
  }

  if (error.code === "timeout") {
    return "API timeout"
  }

  if (error.code === "connection") {
    return "Connection error"
  }

  return "Unexpected error"
}
