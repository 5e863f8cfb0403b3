import type { Logger } from "pino"

import type { EngineConfig } from "../config/engine-config.js"
import {
  createExecutionStrategy,
  createFalJobGateway,
  createPlatformFalClient,
  type ExecutionOutcome,
  type ExecutionStrategy,
  type FalClientLike,
  type JobArguments,
  type JobPayload,
} from "../execution/index.js"
import { createComponentLogger } from "../logging/logger.js"
import {
  createCatalogCache,
  createCatalogFetcher,
  createModelRegistry,
  createModelSearch,
  type ModelRegistry,
} from "../model-registry/index.js"
import { createPlatformClient, type PlatformClient } from "../platform/client.js"

type EngineOverrides = {
  platformClient?: PlatformClient
  falClient?: FalClientLike
  now?: () => number
}

export type Engine = {
  registry: ModelRegistry
  strategy: ExecutionStrategy
  run: (model: string, args: JobArguments, timeoutMs?: number) => Promise<ExecutionOutcome>
  runFast: (model: string, args: JobArguments) => Promise<JobPayload>
}

/**
 * Wires one catalog-backed registry and one execution strategy from configuration. Callers
 * hold the returned engine and pass its parts to whatever consumes them.
 *
 * @param config Resolved engine configuration.
 * @param logger Root logger; components get child loggers.
 * @param overrides Client stand-ins for tests and embedders.
 */
export const createEngine = (
  config: EngineConfig,
  logger: Logger,
  overrides: EngineOverrides = {}
): Engine => {
  const platformClient =
    overrides.platformClient ??
    createPlatformClient({
      baseUrl: config.apiBaseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.requestTimeoutMs,
    })

  const catalogLogger = createComponentLogger("model-catalog", logger)
  const fetcher = createCatalogFetcher({
    client: platformClient,
    logger: catalogLogger,
    pageSize: config.catalog.pageSize,
    maxPages: config.catalog.maxPages,
  })
  const cache = createCatalogCache({
    logger: catalogLogger,
    fetchCatalog: () => fetcher.fetchAll(),
    now: overrides.now,
    ttlMs: config.catalog.ttlMs,
    fallbackTtlMs: config.catalog.fallbackTtlMs,
  })
  const search = createModelSearch({
    client: platformClient,
    logger: createComponentLogger("model-search", logger),
    getSnapshot: cache.getSnapshot,
  })
  const registry = createModelRegistry({ cache, search, client: platformClient })

  const executionLogger = createComponentLogger("execution", logger)
  const gateway = createFalJobGateway({
    client: overrides.falClient ?? createPlatformFalClient(config.apiKey),
    logger: executionLogger,
  })
  const strategy = createExecutionStrategy(config.execution.strategy, {
    gateway,
    logger: executionLogger,
    pollIntervalMs: config.execution.pollIntervalMs,
  })

  return {
    registry,
    strategy,
    run: async (model, args, timeoutMs = config.execution.defaultTimeoutMs) => {
      const modelId = await registry.resolve(model)
      return await strategy.execute(modelId, args, timeoutMs)
    },
    runFast: async (model, args) => {
      const modelId = await registry.resolve(model)
      return await strategy.executeFast(modelId, args)
    },
  }
}
