import type { ExecutionOutcome, JobCompletion, JobPayload, JobStatus } from "./types.js"

const COMPLETED_MARKERS = ["completed", "done"]
const FAILED_MARKERS = ["failed", "error"]

/**
 * Decodes whatever status text the platform reports into a `JobStatus`. Completion markers
 * are checked before failure markers.
 */
export const decodeJobStatus = (statusText: string): JobStatus => {
  const normalized = statusText.toLowerCase()
  if (COMPLETED_MARKERS.some((marker) => normalized.includes(marker))) {
    return "completed"
  }

  if (FAILED_MARKERS.some((marker) => normalized.includes(marker))) {
    return "failed"
  }

  return "running"
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export const normalizeJobPayload = (data: unknown): JobPayload => {
  if (data == null) {
    return {}
  }

  return isRecord(data) ? { ...data } : { value: data }
}

export const toExecutionOutcome = (completion: JobCompletion): ExecutionOutcome => {
  if (completion.status === "completed") {
    return {
      kind: "completed",
      payload: completion.payload,
      requestId: completion.requestId,
    }
  }

  return {
    kind: "failed",
    message: completion.message,
    requestId: completion.requestId,
  }
}
