import type { z } from "zod"

import type { PlatformClient } from "../platform/client.js"
import { PlatformRequestError } from "../platform/errors.js"
import { isCanonicalModelId } from "./aliases.js"
import type { CatalogCache } from "./catalog-cache.js"
import {
  pricingResponseSchema,
  usageResponseSchema,
  type PricingResponse,
  type UsageResponse,
} from "./contracts.js"
import { UnknownAliasError } from "./errors.js"
import { matchesQuery, type ModelSearch } from "./search.js"
import type { ModelCategory, ModelRecord, RecommendResult, SearchResult } from "./types.js"

export const DEFAULT_LIST_LIMIT = 50

type ModelRegistryDependencies = {
  cache: CatalogCache
  search: ModelSearch
  client: PlatformClient
}

export type ListModelsInput = {
  category?: ModelCategory
  search?: string
  limit?: number
}

export type UsageInput = {
  start: string
  end: string
  endpointIds?: string[]
}

export type ModelRegistry = {
  resolve: (input: string) => Promise<string>
  listModels: (input?: ListModelsInput) => Promise<ModelRecord[]>
  getModel: (modelId: string) => Promise<ModelRecord | null>
  modelExists: (input: string) => Promise<boolean>
  getAliases: () => Promise<Record<string, string>>
  search: (query: string, categoryHint?: string, limit?: number) => Promise<SearchResult>
  recommend: (task: string, categoryHint?: string, limit?: number) => Promise<RecommendResult>
  getPricing: (endpointIds: string[]) => Promise<PricingResponse>
  getUsage: (input: UsageInput) => Promise<UsageResponse>
  refresh: () => Promise<void>
}

const parsePassThrough = <T>(
  payload: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  endpoint: string
): T => {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw new PlatformRequestError(
      "invalid_payload",
      `Platform returned invalid payload for ${endpoint}`
    )
  }

  return parsed.data
}

/**
 * The lookup surface handlers consume: alias resolution, catalog listing, search and the
 * pricing/usage pass-through endpoints, all backed by one shared catalog cache.
 *
 * @param dependencies Catalog cache, search service and platform client.
 */
export const createModelRegistry = (dependencies: ModelRegistryDependencies): ModelRegistry => {
  const resolve = async (input: string): Promise<string> => {
    if (isCanonicalModelId(input)) {
      return input
    }

    const snapshot = await dependencies.cache.getSnapshot()
    const modelId = snapshot.aliases.get(input)
    if (modelId === undefined) {
      throw new UnknownAliasError(input)
    }

    return modelId
  }

  return {
    resolve,
    listModels: async (input = {}) => {
      const snapshot = await dependencies.cache.getSnapshot()
      const limit = input.limit ?? DEFAULT_LIST_LIMIT

      let models: ModelRecord[]
      if (input.category) {
        models = snapshot.byCategory[input.category].flatMap((modelId) => {
          const model = snapshot.models.get(modelId)
          return model ? [model] : []
        })
      } else {
        models = [...snapshot.models.values()]
      }

      const query = input.search
      if (query) {
        models = models.filter((model) => matchesQuery(model, query))
      }

      return models.slice(0, limit)
    },
    getModel: async (modelId) => {
      const snapshot = await dependencies.cache.getSnapshot()
      return snapshot.models.get(modelId) ?? null
    },
    modelExists: async (input) => {
      if (isCanonicalModelId(input)) {
        // The platform validates canonical ids when a job is submitted.
        return true
      }

      const snapshot = await dependencies.cache.getSnapshot()
      return snapshot.aliases.has(input)
    },
    getAliases: async () => {
      const snapshot = await dependencies.cache.getSnapshot()
      return Object.fromEntries(snapshot.aliases)
    },
    search: async (query, categoryHint, limit = DEFAULT_LIST_LIMIT) => {
      return await dependencies.search.search({ query, categoryHint, limit })
    },
    recommend: async (task, categoryHint, limit = 5) => {
      return await dependencies.search.recommend({ task, categoryHint, limit })
    },
    getPricing: async (endpointIds) => {
      const payload = await dependencies.client.getJson("/models/pricing", {
        endpoint_id: endpointIds,
      })
      return parsePassThrough(payload, pricingResponseSchema, "/models/pricing")
    },
    getUsage: async (input) => {
      const payload = await dependencies.client.getJson("/models/usage", {
        start: input.start,
        end: input.end,
        endpoint_id: input.endpointIds && input.endpointIds.length > 0 ? input.endpointIds : null,
      })
      return parsePassThrough(payload, usageResponseSchema, "/models/usage")
    },
    refresh: async () => {
      await dependencies.cache.refreshNow()
    },
  }
}
