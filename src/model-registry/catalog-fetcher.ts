import type { Logger } from "pino"

import type { PlatformClient } from "../platform/client.js"
import { PlatformRequestError } from "../platform/errors.js"
import { MODEL_ID_SEPARATOR } from "./aliases.js"
import { modelsPageSchema, rawModelSchema, type RawModel } from "./contracts.js"
import { MalformedResponseError } from "./errors.js"
import type { ModelRecord } from "./types.js"

type CatalogFetcherDependencies = {
  client: PlatformClient
  logger: Pick<Logger, "warn" | "debug">
  pageSize: number
  maxPages: number
}

export type CatalogFetcher = {
  fetchAll: (categoryFilter?: string) => Promise<RawModel[]>
}

export type ModelsPage = {
  items: RawModel[]
  nextCursor: string | null
  hasMore: boolean | null
  skipped: number
}

const readItems = (value: unknown): { items: RawModel[]; skipped: number } => {
  if (!Array.isArray(value)) {
    return { items: [], skipped: 0 }
  }

  const items: RawModel[] = []
  for (const entry of value) {
    const parsed = rawModelSchema.safeParse(entry)
    if (parsed.success) {
      items.push(parsed.data)
    }
  }

  return { items, skipped: value.length - items.length }
}

/**
 * Reads one page of the catalog endpoint. Current payloads list models under `models`,
 * older ones under `items`; either is accepted.
 */
export const parseModelsPage = (payload: unknown): ModelsPage => {
  const parsed = modelsPageSchema.safeParse(payload)
  if (!parsed.success) {
    throw new PlatformRequestError("invalid_payload", "Model catalog page is not a JSON object")
  }

  const page = parsed.data
  const source = page.models !== undefined ? page.models : page.items
  const nextCursor =
    typeof page.next_cursor === "string" && page.next_cursor.length > 0 ? page.next_cursor : null

  const { items, skipped } = readItems(source)

  return {
    items,
    nextCursor,
    hasMore: page.has_more ?? null,
    skipped,
  }
}

/**
 * Pages through `GET /models` until the platform stops handing out cursors or reports
 * `has_more: false`, whichever comes first.
 *
 * @param dependencies Platform client, logger and paging limits.
 */
export const createCatalogFetcher = (dependencies: CatalogFetcherDependencies): CatalogFetcher => {
  return {
    fetchAll: async (categoryFilter) => {
      const models: RawModel[] = []
      let cursor: string | null = null

      for (let pageIndex = 0; pageIndex < dependencies.maxPages; pageIndex += 1) {
        const payload = await dependencies.client.getJson("/models", {
          limit: dependencies.pageSize,
          cursor,
          category: categoryFilter,
        })
        const page = parseModelsPage(payload)

        if (pageIndex === 0 && page.items.length === 0) {
          dependencies.logger.warn(
            { category: categoryFilter ?? null },
            "Model catalog returned an empty first page"
          )
        }

        if (page.skipped > 0) {
          dependencies.logger.warn(
            { page: pageIndex + 1, skipped: page.skipped },
            "Skipped catalog entries that are not objects"
          )
        }

        models.push(...page.items)

        if (page.nextCursor === null || page.hasMore === false) {
          dependencies.logger.debug(
            { pages: pageIndex + 1, count: models.length },
            "Model catalog fetch finished"
          )
          return models
        }

        cursor = page.nextCursor
      }

      dependencies.logger.warn(
        { maxPages: dependencies.maxPages, count: models.length },
        "Model catalog pagination stopped at page limit"
      )
      return models
    },
  }
}

const nonEmpty = (...values: Array<string | null | undefined>): string | null => {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim()
    }
  }

  return null
}

export const hasModelId = (raw: RawModel): boolean => {
  return nonEmpty(raw.endpoint_id, raw.id) !== null
}

export const resolveOwner = (modelId: string): string => {
  const separatorIndex = modelId.indexOf(MODEL_ID_SEPARATOR)
  return separatorIndex < 0 ? "" : modelId.slice(0, separatorIndex)
}

/**
 * Converts one raw catalog entry into an immutable `ModelRecord`. Display fields are read
 * from `metadata` when present and fall back to top-level fields, then to empty values.
 *
 * @throws MalformedResponseError when the entry carries no endpoint id at all.
 */
export const normalizeModelRecord = (raw: RawModel): ModelRecord => {
  const id = nonEmpty(raw.endpoint_id, raw.id)
  if (id === null) {
    throw new MalformedResponseError("Catalog entry is missing endpoint_id")
  }

  const metadata = raw.metadata
  const tags = (metadata?.tags ?? []).filter((tag): tag is string => typeof tag === "string")
  const status = nonEmpty(raw.status, metadata?.status)

  return Object.freeze({
    id,
    name: nonEmpty(metadata?.display_name, raw.title, raw.name) ?? id,
    description: nonEmpty(metadata?.description, raw.description) ?? "",
    category: nonEmpty(metadata?.category, raw.category) ?? "",
    owner: resolveOwner(id),
    thumbnailUrl: nonEmpty(metadata?.thumbnail_url, raw.thumbnail_url),
    highlighted: raw.highlighted === true,
    groupKey: nonEmpty(raw.group?.key),
    groupLabel: nonEmpty(raw.group?.label),
    status: status?.toLowerCase() === "deprecated" ? "deprecated" : "active",
    tags: Object.freeze(tags),
  })
}
