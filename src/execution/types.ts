export type JobArguments = Record<string, unknown>

export type JobPayload = Record<string, unknown>

export type JobStatus = "running" | "completed" | "failed"

/**
 * Reference to one submitted job. Created by `JobSubmitter.submit` and handed to exactly one
 * awaiting step of the same execution.
 */
export type JobHandle = Readonly<{
  modelId: string
  requestId: string
}>

export type JobCompletion =
  | { status: "completed"; payload: JobPayload; requestId: string }
  | { status: "failed"; message: string; requestId: string | null }

export type ExecutionOutcome =
  | { kind: "completed"; payload: JobPayload; requestId: string }
  | { kind: "failed"; message: string; requestId: string | null }
  | { kind: "timed_out"; timeoutMs: number; requestId: string | null }

/**
 * Result of handing a job to the queue. A submission the platform refuses is `rejected`
 * and never carries a handle.
 */
export type JobSubmission =
  | { status: "submitted"; handle: JobHandle }
  | { status: "rejected"; message: string }

export type JobSubmitter = {
  submit: (modelId: string, args: JobArguments) => Promise<JobSubmission>
}

export type JobStatusReport = {
  status: JobStatus
  detail: string
}

export type JobStatusReader = {
  readStatus: (handle: JobHandle) => Promise<JobStatusReport>
}

export type JobResultReader = {
  readResult: (handle: JobHandle) => Promise<JobCompletion>
}

export type JobResultWaiter = {
  waitForResult: (handle: JobHandle, signal: AbortSignal) => Promise<JobCompletion>
}

export type JobStreamSubscriber = {
  subscribe: (modelId: string, args: JobArguments, signal: AbortSignal) => Promise<JobCompletion>
}

export type DirectRunner = {
  run: (modelId: string, args: JobArguments) => Promise<JobPayload>
}

export type ExecutionStrategy = {
  readonly kind: string
  execute: (modelId: string, args: JobArguments, timeoutMs: number) => Promise<ExecutionOutcome>
  executeFast: (modelId: string, args: JobArguments) => Promise<JobPayload>
}
