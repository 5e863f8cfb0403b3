import type { Logger } from "pino"

import { JobTimeoutError } from "./errors.js"
import { toExecutionOutcome } from "./job-status.js"
import { raceWithTimeout } from "./timing.js"
import type { DirectRunner, ExecutionStrategy, JobStreamSubscriber } from "./types.js"

type SubscribeStrategyDependencies = {
  gateway: JobStreamSubscriber & DirectRunner
  logger: Pick<Logger, "debug" | "warn">
}

/**
 * Submits through a streamed subscription and waits for its completion event. Unlike the
 * other strategies, running out of time raises `JobTimeoutError` instead of returning a
 * `timed_out` outcome.
 *
 * @param dependencies Gateway exposing streamed subscription and direct runs.
 */
export const createSubscribeStrategy = (
  dependencies: SubscribeStrategyDependencies
): ExecutionStrategy => {
  return {
    kind: "subscribe",
    execute: async (modelId, args, timeoutMs) => {
      const controller = new AbortController()
      const result = await raceWithTimeout(
        dependencies.gateway.subscribe(modelId, args, controller.signal),
        timeoutMs,
        () => controller.abort()
      )

      if (!result.settled) {
        dependencies.logger.warn({ modelId, timeoutMs }, "Subscribed job timed out")
        throw new JobTimeoutError(modelId, timeoutMs)
      }

      dependencies.logger.debug(
        { modelId, requestId: result.value.requestId, status: result.value.status },
        "Subscribed job finished"
      )
      return toExecutionOutcome(result.value)
    },
    executeFast: async (modelId, args) => {
      return await dependencies.gateway.run(modelId, args)
    },
  }
}
