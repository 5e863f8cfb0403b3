import type { Logger } from "pino"

import { hasModelId, normalizeModelRecord } from "./catalog-fetcher.js"
import type { RawModel } from "./contracts.js"
import { buildCatalogSnapshot, buildFallbackSnapshot, isSnapshotValid } from "./snapshot.js"
import type { CatalogSnapshot, ModelRecord } from "./types.js"

export const DEFAULT_SNAPSHOT_TTL_MS = 60 * 60 * 1000
export const DEFAULT_FALLBACK_TTL_MS = 60 * 1000

type CatalogCacheDependencies = {
  logger: Pick<Logger, "info" | "warn">
  fetchCatalog: () => Promise<RawModel[]>
  now?: () => number
  ttlMs?: number
  fallbackTtlMs?: number
}

export type CatalogCache = {
  getSnapshot: () => Promise<CatalogSnapshot>
  refreshNow: () => Promise<CatalogSnapshot>
  peekSnapshot: () => CatalogSnapshot | null
}

const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Owns the catalog snapshot. Reads are served from memory while the snapshot is fresh;
 * expired reads trigger one shared refresh that every concurrent caller awaits. A failed
 * refresh keeps the last snapshot, or installs the seed fallback when there is none, so
 * `getSnapshot` always resolves.
 *
 * @param dependencies Logger, raw catalog fetch and ttl settings.
 */
export const createCatalogCache = (dependencies: CatalogCacheDependencies): CatalogCache => {
  const now = dependencies.now ?? Date.now
  const ttlMs = dependencies.ttlMs ?? DEFAULT_SNAPSHOT_TTL_MS
  const fallbackTtlMs = dependencies.fallbackTtlMs ?? DEFAULT_FALLBACK_TTL_MS

  if (fallbackTtlMs >= ttlMs) {
    throw new Error(
      `Catalog fallback ttl (${fallbackTtlMs}ms) must be lower than the snapshot ttl (${ttlMs}ms)`
    )
  }

  let snapshot: CatalogSnapshot | null = null
  let inFlight: Promise<CatalogSnapshot> | null = null

  const normalizeRecords = (rawModels: RawModel[]): ModelRecord[] => {
    const usable = rawModels.filter(hasModelId)
    const skipped = rawModels.length - usable.length
    if (skipped > 0) {
      dependencies.logger.warn({ skipped }, "Skipped catalog entries without an endpoint id")
    }

    return usable.map(normalizeModelRecord)
  }

  const refresh = async (): Promise<CatalogSnapshot> => {
    try {
      const rawModels = await dependencies.fetchCatalog()
      const next = buildCatalogSnapshot({
        records: normalizeRecords(rawModels),
        fetchedAt: now(),
        ttlMs,
        source: "network",
      })
      snapshot = next
      dependencies.logger.info(
        { modelCount: next.models.size, aliasCount: next.aliases.size },
        "Model catalog refreshed"
      )
      return next
    } catch (error) {
      if (snapshot !== null) {
        dependencies.logger.warn(
          {
            error: describeError(error),
            fetchedAt: snapshot.fetchedAt,
            source: snapshot.source,
            cachedModelCount: snapshot.models.size,
          },
          "Model catalog refresh failed; serving previous snapshot"
        )
        return snapshot
      }

      const fallback = buildFallbackSnapshot(now(), fallbackTtlMs)
      snapshot = fallback
      dependencies.logger.warn(
        { error: describeError(error), fallbackTtlMs, aliasCount: fallback.aliases.size },
        "Model catalog unavailable; using built-in fallback catalog"
      )
      return fallback
    }
  }

  const refreshShared = (): Promise<CatalogSnapshot> => {
    if (inFlight === null) {
      inFlight = refresh().finally(() => {
        inFlight = null
      })
    }

    return inFlight
  }

  return {
    getSnapshot: async () => {
      if (snapshot !== null && isSnapshotValid(snapshot, now())) {
        return snapshot
      }

      return await refreshShared()
    },
    refreshNow: async () => {
      return await refreshShared()
    },
    peekSnapshot: () => snapshot,
  }
}
