import type { Logger } from "pino"

import { toExecutionOutcome } from "./job-status.js"
import { createDeadline, raceWithTimeout, systemClock, type Clock } from "./timing.js"
import type {
  DirectRunner,
  ExecutionOutcome,
  ExecutionStrategy,
  JobResultReader,
  JobStatusReader,
  JobSubmitter,
} from "./types.js"

export const DEFAULT_POLL_INTERVAL_MS = 2_000

type PollingStrategyDependencies = {
  gateway: JobSubmitter & JobStatusReader & JobResultReader & DirectRunner
  logger: Pick<Logger, "debug" | "warn">
  pollIntervalMs?: number
  clock?: Clock
}

/**
 * Submits a job, then reads its status every `pollIntervalMs` until it completes, fails or
 * the timeout runs out. Sleeps are clamped to the time left, and a job still running at
 * the deadline yields a `timed_out` outcome.
 *
 * @param dependencies Gateway, logger, poll interval and an optional clock for tests.
 */
export const createPollingStrategy = (
  dependencies: PollingStrategyDependencies
): ExecutionStrategy => {
  const pollIntervalMs = dependencies.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
  const clock = dependencies.clock ?? systemClock

  return {
    kind: "polling",
    execute: async (modelId, args, timeoutMs) => {
      const deadline = createDeadline(clock, timeoutMs)
      const timedOut = (requestId: string | null): ExecutionOutcome => {
        dependencies.logger.warn({ modelId, requestId, timeoutMs }, "Polled job timed out")
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
      let polls = 0

      while (!deadline.expired()) {
        const report = await raceWithTimeout(
          dependencies.gateway.readStatus(handle),
          deadline.remainingMs()
        )
        if (!report.settled) {
          break
        }

        polls += 1

        if (report.value.status === "completed") {
          const completion = await raceWithTimeout(
            dependencies.gateway.readResult(handle),
            deadline.remainingMs()
          )
          if (!completion.settled) {
            break
          }

          dependencies.logger.debug(
            { modelId, requestId: handle.requestId, polls },
            "Polled job completed"
          )
          return toExecutionOutcome(completion.value)
        }

        if (report.value.status === "failed") {
          return {
            kind: "failed",
            message: `Job failed: ${report.value.detail}`,
            requestId: handle.requestId,
          }
        }

        const remainingMs = deadline.remainingMs()
        if (remainingMs <= 0) {
          break
        }

        await clock.sleep(Math.min(pollIntervalMs, remainingMs))
      }

      return timedOut(handle.requestId)
    },
    executeFast: async (modelId, args) => {
      return await dependencies.gateway.run(modelId, args)
    },
  }
}
