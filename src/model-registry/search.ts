import type { Logger } from "pino"

import type { PlatformClient } from "../platform/client.js"
import { describePlatformFailure } from "../platform/errors.js"
import { hasModelId, normalizeModelRecord, parseModelsPage } from "./catalog-fetcher.js"
import { SEARCH_CATEGORY_BY_HINT, modelCategorySchema } from "./contracts.js"
import type {
  CatalogSnapshot,
  ModelRecord,
  Recommendation,
  RecommendResult,
  SearchResult,
} from "./types.js"

type ModelSearchDependencies = {
  client: PlatformClient
  logger: Pick<Logger, "warn">
  getSnapshot: () => Promise<CatalogSnapshot>
}

export type SearchInput = {
  query: string
  categoryHint?: string
  limit: number
}

export type RecommendInput = {
  task: string
  categoryHint?: string
  limit: number
}

export type ModelSearch = {
  search: (input: SearchInput) => Promise<SearchResult>
  recommend: (input: RecommendInput) => Promise<RecommendResult>
}

/**
 * Maps `image` / `video` / `audio` onto the platform category searched for them; any other
 * hint is taken to be a platform category already.
 */
export const resolveSearchCategory = (hint: string | undefined): string | undefined => {
  if (hint === undefined || hint.trim().length === 0) {
    return undefined
  }

  const simplified = modelCategorySchema.safeParse(hint)
  return simplified.success ? SEARCH_CATEGORY_BY_HINT[simplified.data] : hint
}

/**
 * Highlighted models first, then by display name.
 */
export const rankModels = (models: readonly ModelRecord[]): ModelRecord[] => {
  return [...models].sort((left, right) => {
    if (left.highlighted !== right.highlighted) {
      return left.highlighted ? -1 : 1
    }

    return left.name.localeCompare(right.name)
  })
}

export const matchesQuery = (model: ModelRecord, query: string): boolean => {
  const needle = query.toLowerCase()
  return (
    model.name.toLowerCase().includes(needle) ||
    model.description.toLowerCase().includes(needle) ||
    model.id.toLowerCase().includes(needle)
  )
}

const matchesCategory = (model: ModelRecord, category: string | undefined): boolean => {
  return category === undefined || model.category === category
}

/**
 * Explains a recommendation from the strongest signals the catalog carries.
 */
export const buildRecommendationReason = (model: ModelRecord): string => {
  const reasons: string[] = []
  if (model.highlighted) {
    reasons.push("Featured model")
  }

  if (model.groupLabel) {
    reasons.push(`Part of the ${model.groupLabel} family`)
  }

  if (model.category) {
    reasons.push(`${model.category} model`)
  }

  return reasons.length > 0 ? reasons.join("; ") : "Matches search"
}

const scoreAt = (index: number, candidateCount: number): number => {
  return Math.round((1 - index / candidateCount) * 1000) / 1000
}

const normalizeSearchHits = (payload: unknown): ModelRecord[] => {
  return parseModelsPage(payload).items.filter(hasModelId).map(normalizeModelRecord)
}

/**
 * Semantic search against the platform with a local substring search over the cached
 * catalog when the platform call fails. Degraded results say so through `usedFallback`.
 *
 * @param dependencies Platform client, logger and catalog snapshot accessor.
 */
export const createModelSearch = (dependencies: ModelSearchDependencies): ModelSearch => {
  const searchLocally = async (
    query: string,
    category: string | undefined,
    limit: number
  ): Promise<ModelRecord[]> => {
    const snapshot = await dependencies.getSnapshot()
    const matches = [...snapshot.models.values()].filter(
      (model) => matchesCategory(model, category) && matchesQuery(model, query)
    )

    return rankModels(matches).slice(0, limit)
  }

  const search = async (input: SearchInput): Promise<SearchResult> => {
    const category = resolveSearchCategory(input.categoryHint)

    try {
      const payload = await dependencies.client.getJson("/models", {
        q: input.query,
        category,
        limit: input.limit,
      })

      return {
        models: rankModels(normalizeSearchHits(payload)).slice(0, input.limit),
        usedFallback: false,
        fallbackReason: null,
      }
    } catch (error) {
      const fallbackReason = describePlatformFailure(error)
      dependencies.logger.warn(
        {
          query: input.query,
          category: category ?? null,
          reason: fallbackReason,
          error: error instanceof Error ? error.message : String(error),
        },
        "Model search failed; filtering cached catalog instead"
      )

      return {
        models: await searchLocally(input.query, category, input.limit),
        usedFallback: true,
        fallbackReason,
      }
    }
  }

  return {
    search,
    recommend: async (input) => {
      const result = await search({
        query: input.task,
        categoryHint: input.categoryHint,
        limit: input.limit * 2,
      })
      const candidateCount = result.models.length

      const recommendations: Recommendation[] = result.models
        .slice(0, input.limit)
        .map((model, index) => ({
          modelId: model.id,
          name: model.name,
          description: model.description,
          category: model.category,
          highlighted: model.highlighted,
          group: model.groupLabel,
          score: scoreAt(index, candidateCount),
          reason: buildRecommendationReason(model),
        }))

      return {
        recommendations,
        usedFallback: result.usedFallback,
        fallbackReason: result.fallbackReason,
      }
    },
  }
}
