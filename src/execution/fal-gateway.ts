import { ApiError, createFalClient } from "@fal-ai/client"
import type { Logger } from "pino"

import { decodeJobStatus, normalizeJobPayload } from "./job-status.js"
import type {
  DirectRunner,
  JobArguments,
  JobCompletion,
  JobHandle,
  JobResultReader,
  JobResultWaiter,
  JobStatusReader,
  JobStreamSubscriber,
  JobSubmission,
  JobSubmitter,
} from "./types.js"

type FalResult = {
  data: unknown
  requestId: string
}

type FalQueueStatus = {
  status: string
}

/**
 * The subset of the `@fal-ai/client` surface the gateway calls. A real client returned by
 * `createFalClient` satisfies it; tests pass a stand-in.
 */
export type FalClientLike = {
  run: (
    endpointId: string,
    options: { input: JobArguments; abortSignal?: AbortSignal }
  ) => Promise<FalResult>
  subscribe: (
    endpointId: string,
    options: {
      input: JobArguments
      logs: boolean
      mode: "streaming"
      abortSignal?: AbortSignal
      onEnqueue?: (requestId: string) => void
      onQueueUpdate?: (update: FalQueueStatus) => void
    }
  ) => Promise<FalResult>
  queue: {
    submit: (
      endpointId: string,
      options: { input: JobArguments }
    ) => Promise<{ request_id: string }>
    status: (
      endpointId: string,
      options: { requestId: string; logs: boolean }
    ) => Promise<FalQueueStatus>
    subscribeToStatus: (
      endpointId: string,
      options: {
        requestId: string
        mode: "polling"
        pollInterval: number
        abortSignal?: AbortSignal
      }
    ) => Promise<FalQueueStatus>
    result: (
      endpointId: string,
      options: { requestId: string; abortSignal?: AbortSignal }
    ) => Promise<FalResult>
  }
}

export type JobGateway = JobSubmitter &
  JobStatusReader &
  JobResultReader &
  JobResultWaiter &
  JobStreamSubscriber &
  DirectRunner

type FalJobGatewayDependencies = {
  client: FalClientLike
  logger: Pick<Logger, "debug">
  waitPollIntervalMs?: number
}

const DEFAULT_WAIT_POLL_INTERVAL_MS = 1_000

export const createPlatformFalClient = (apiKey: string | null): FalClientLike => {
  return createFalClient(apiKey ? { credentials: apiKey } : {})
}

const completed = (result: FalResult): JobCompletion => {
  return {
    status: "completed",
    payload: normalizeJobPayload(result.data),
    requestId: result.requestId,
  }
}

const describeRemoteFailure = (error: { status: number; message: string }): string => {
  return `Job failed (HTTP ${error.status}): ${error.message}`
}

/**
 * Runs `work` and turns an error the platform reports for the job itself into a `failed`
 * completion. Transport and programming errors propagate unchanged.
 */
const settleRemoteFailure = async (
  resolveRequestId: () => string | null,
  work: () => Promise<FalResult>
): Promise<JobCompletion> => {
  try {
    return completed(await work())
  } catch (error) {
    if (error instanceof ApiError) {
      return {
        status: "failed",
        message: describeRemoteFailure(error),
        requestId: resolveRequestId(),
      }
    }

    throw error
  }
}

/**
 * Adapts the fal queue client to the job capabilities the execution strategies depend on.
 * Native queue responses are converted here once: submissions become `JobHandle`s and status
 * text becomes a `JobStatus`.
 *
 * @param dependencies fal client, logger and the poll interval used while blocking on a job.
 */
export const createFalJobGateway = (dependencies: FalJobGatewayDependencies): JobGateway => {
  const { client, logger } = dependencies
  const waitPollIntervalMs = dependencies.waitPollIntervalMs ?? DEFAULT_WAIT_POLL_INTERVAL_MS

  return {
    submit: async (modelId, args): Promise<JobSubmission> => {
      try {
        const queued = await client.queue.submit(modelId, { input: args })
        logger.debug({ modelId, requestId: queued.request_id }, "Job submitted")
        const handle: JobHandle = Object.freeze({ modelId, requestId: queued.request_id })
        return { status: "submitted", handle }
      } catch (error) {
        if (error instanceof ApiError) {
          logger.debug({ modelId, status: error.status }, "Job submission rejected")
          return { status: "rejected", message: describeRemoteFailure(error) }
        }

        throw error
      }
    },
    readStatus: async (handle) => {
      const response = await client.queue.status(handle.modelId, {
        requestId: handle.requestId,
        logs: false,
      })
      const detail = response.status
      return { status: decodeJobStatus(detail), detail }
    },
    readResult: async (handle) => {
      return await settleRemoteFailure(() => handle.requestId, () =>
        client.queue.result(handle.modelId, { requestId: handle.requestId })
      )
    },
    waitForResult: async (handle, signal) => {
      return await settleRemoteFailure(() => handle.requestId, async () => {
        await client.queue.subscribeToStatus(handle.modelId, {
          requestId: handle.requestId,
          mode: "polling",
          pollInterval: waitPollIntervalMs,
          abortSignal: signal,
        })
        return await client.queue.result(handle.modelId, {
          requestId: handle.requestId,
          abortSignal: signal,
        })
      })
    },
    subscribe: async (modelId, args, signal) => {
      let requestId: string | null = null
      return await settleRemoteFailure(() => requestId, () =>
        client.subscribe(modelId, {
          input: args,
          logs: true,
          mode: "streaming",
          abortSignal: signal,
          onEnqueue: (enqueuedId) => {
            requestId = enqueuedId
          },
          onQueueUpdate: (update) => {
            logger.debug({ modelId, requestId, status: update.status }, "Job queue update")
          },
        })
      )
    },
    run: async (modelId, args) => {
      const result = await client.run(modelId, { input: args })
      return normalizeJobPayload(result.data)
    },
  }
}
