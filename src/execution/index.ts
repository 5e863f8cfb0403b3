import type { Logger } from "pino"

import type { ExecutionStrategyKind } from "../config/engine-config.js"
import type { JobGateway } from "./fal-gateway.js"
import { createHandleGetStrategy } from "./handle-get-strategy.js"
import { createPollingStrategy } from "./polling-strategy.js"
import { createSubscribeStrategy } from "./subscribe-strategy.js"
import type { Clock } from "./timing.js"
import type { ExecutionStrategy } from "./types.js"

type ExecutionStrategyDependencies = {
  gateway: JobGateway
  logger: Pick<Logger, "debug" | "warn">
  pollIntervalMs?: number
  clock?: Clock
}

/**
 * Picks the execution strategy for a configured waiting pattern. All variants share the
 * `ExecutionStrategy` contract; only the subscribe variant raises on timeout.
 */
export const createExecutionStrategy = (
  kind: ExecutionStrategyKind,
  dependencies: ExecutionStrategyDependencies
): ExecutionStrategy => {
  if (kind === "polling") {
    return createPollingStrategy(dependencies)
  }

  if (kind === "handle-get") {
    return createHandleGetStrategy(dependencies)
  }

  return createSubscribeStrategy(dependencies)
}

export { JobTimeoutError } from "./errors.js"
export { createFalJobGateway, createPlatformFalClient } from "./fal-gateway.js"
export { createHandleGetStrategy } from "./handle-get-strategy.js"
export { decodeJobStatus, normalizeJobPayload } from "./job-status.js"
export { createPollingStrategy, DEFAULT_POLL_INTERVAL_MS } from "./polling-strategy.js"
export { createSubscribeStrategy } from "./subscribe-strategy.js"
export { MAX_TIMER_DELAY_MS } from "./timing.js"
export type { FalClientLike, JobGateway } from "./fal-gateway.js"
export type {
  ExecutionOutcome,
  ExecutionStrategy,
  JobArguments,
  JobCompletion,
  JobHandle,
  JobPayload,
  JobStatus,
  JobStatusReport,
  JobSubmission,
} from "./types.js"
