import { z } from "zod"

import { DEFAULT_POLL_INTERVAL_MS } from "../execution/polling-strategy.js"
import { MAX_TIMER_DELAY_MS } from "../execution/timing.js"
import {
  DEFAULT_FALLBACK_TTL_MS,
  DEFAULT_SNAPSHOT_TTL_MS,
} from "../model-registry/catalog-cache.js"

export const EXECUTION_STRATEGY_KINDS = ["subscribe", "polling", "handle-get"] as const

export type ExecutionStrategyKind = (typeof EXECUTION_STRATEGY_KINDS)[number]

export const DEFAULT_API_BASE_URL = "https://api.fal.ai/v1"
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
export const DEFAULT_CATALOG_PAGE_SIZE = 100
export const DEFAULT_CATALOG_MAX_PAGES = 50
export const DEFAULT_JOB_TIMEOUT_MS = 300_000

const optionalTrimmed = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined))

const positiveInt = (fallback: number) => {
  return z.coerce.number().int().min(1).default(fallback)
}

const timerDelayMs = (fallback: number) => {
  return z.coerce.number().int().min(1).max(MAX_TIMER_DELAY_MS).default(fallback)
}

const environmentSchema = z
  .object({
    FAL_KEY: optionalTrimmed,
    GENMEDIA_API_BASE_URL: optionalTrimmed.pipe(z.string().url().optional()),
    GENMEDIA_REQUEST_TIMEOUT_MS: timerDelayMs(DEFAULT_REQUEST_TIMEOUT_MS),
    GENMEDIA_CATALOG_TTL_MS: positiveInt(DEFAULT_SNAPSHOT_TTL_MS),
    GENMEDIA_CATALOG_FALLBACK_TTL_MS: positiveInt(DEFAULT_FALLBACK_TTL_MS),
    GENMEDIA_CATALOG_PAGE_SIZE: z.coerce
      .number()
      .int()
      .min(1)
      .max(500)
      .default(DEFAULT_CATALOG_PAGE_SIZE),
    GENMEDIA_CATALOG_MAX_PAGES: positiveInt(DEFAULT_CATALOG_MAX_PAGES),
    GENMEDIA_EXECUTION_STRATEGY: z.enum(EXECUTION_STRATEGY_KINDS).default("subscribe"),
    GENMEDIA_POLL_INTERVAL_MS: timerDelayMs(DEFAULT_POLL_INTERVAL_MS),
    GENMEDIA_JOB_TIMEOUT_MS: timerDelayMs(DEFAULT_JOB_TIMEOUT_MS),
    GENMEDIA_LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .optional(),
  })
  .superRefine((values, ctx) => {
    if (values.GENMEDIA_CATALOG_FALLBACK_TTL_MS >= values.GENMEDIA_CATALOG_TTL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GENMEDIA_CATALOG_FALLBACK_TTL_MS"],
        message: "must be lower than GENMEDIA_CATALOG_TTL_MS",
      })
    }
  })

export type EngineConfig = {
  apiBaseUrl: string
  apiKey: string | null
  requestTimeoutMs: number
  logLevel: string | null
  catalog: {
    ttlMs: number
    fallbackTtlMs: number
    pageSize: number
    maxPages: number
  }
  execution: {
    strategy: ExecutionStrategyKind
    pollIntervalMs: number
    defaultTimeoutMs: number
  }
}

const pickEnvironment = (environment: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const keys = Object.keys(environmentSchema.innerType().shape)
  const picked: Record<string, string | undefined> = {}
  for (const key of keys) {
    const value = environment[key]
    picked[key] = value === undefined || value.trim().length === 0 ? undefined : value
  }

  return picked
}

/**
 * Reads engine settings from the process environment. The platform credential is read here
 * once and nowhere else.
 *
 * @param environment Environment override used by tests and embedders.
 * @returns Normalized engine configuration.
 */
export const resolveEngineConfig = (environment: NodeJS.ProcessEnv = process.env): EngineConfig => {
  const parsed = environmentSchema.safeParse(pickEnvironment(environment))
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid genmedia engine configuration: ${details}`)
  }

  const values = parsed.data

  return {
    apiBaseUrl: (values.GENMEDIA_API_BASE_URL ?? DEFAULT_API_BASE_URL).replace(/\/$/, ""),
    apiKey: values.FAL_KEY ?? null,
    requestTimeoutMs: values.GENMEDIA_REQUEST_TIMEOUT_MS,
    logLevel: values.GENMEDIA_LOG_LEVEL ?? null,
    catalog: {
      ttlMs: values.GENMEDIA_CATALOG_TTL_MS,
      fallbackTtlMs: values.GENMEDIA_CATALOG_FALLBACK_TTL_MS,
      pageSize: values.GENMEDIA_CATALOG_PAGE_SIZE,
      maxPages: values.GENMEDIA_CATALOG_MAX_PAGES,
    },
    execution: {
      strategy: values.GENMEDIA_EXECUTION_STRATEGY,
      pollIntervalMs: values.GENMEDIA_POLL_INTERVAL_MS,
      defaultTimeoutMs: values.GENMEDIA_JOB_TIMEOUT_MS,
    },
  }
}
