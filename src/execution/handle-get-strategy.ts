import type { Logger } from "pino"

import { toExecutionOutcome } from "./job-status.js"
import { createDeadline, raceWithTimeout, systemClock, type Clock } from "./timing.js"
import type {
  DirectRunner,
  ExecutionOutcome,
  ExecutionStrategy,
  JobResultWaiter,
  JobSubmitter,
} from "./types.js"

type HandleGetStrategyDependencies = {
  gateway: JobSubmitter & JobResultWaiter & DirectRunner
  logger: Pick<Logger, "debug" | "warn">
  clock?: Clock
}

/**
 * Submits a job and blocks on a single wait-for-result call. When the timeout runs out the
 * wait is aborted and a `timed_out` outcome is returned.
 *
 * @param dependencies Gateway, logger and an optional clock for tests.
 */
export const createHandleGetStrategy = (
  dependencies: HandleGetStrategyDependencies
): ExecutionStrategy => {
  const clock = dependencies.clock ?? systemClock

  return {
    kind: "handle-get",
    execute: async (modelId, args, timeoutMs) => {
      const deadline = createDeadline(clock, timeoutMs)
      const timedOut = (requestId: string | null): ExecutionOutcome => {
        dependencies.logger.warn({ modelId, requestId, timeoutMs }, "Awaited job timed out")
        return { kind: "timed_out", timeoutMs, requestId }
      }

      const submitted = await raceWithTimeout(
        dependencies.gateway.submit(modelId, args),
        deadline.remainingMs()
      )
      if (!submitted.settled) {
        return timedOut(null)
      }

      if (submitted.value.status === "rejected") {
        return { kind: "failed", message: submitted.value.message, requestId: null }
      }

      const handle = submitted.value.handle
      const controller = new AbortController()
      const completion = await raceWithTimeout(
        dependencies.gateway.waitForResult(handle, controller.signal),
        deadline.remainingMs(),
        () => controller.abort()
      )
      if (!completion.settled) {
        return timedOut(handle.requestId)
      }

      dependencies.logger.debug(
        { modelId, requestId: handle.requestId, status: completion.value.status },
        "Awaited job finished"
      )
      return toExecutionOutcome(completion.value)
    },
    executeFast: async (modelId, args) => {
      return await dependencies.gateway.run(modelId, args)
    },
  }
}
