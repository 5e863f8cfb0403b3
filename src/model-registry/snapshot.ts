import { LEGACY_SEED_MODELS, buildAliasMap } from "./aliases.js"
import { resolveOwner } from "./catalog-fetcher.js"
import { CATEGORY_MAPPING } from "./contracts.js"
import type { CatalogSnapshot, CatalogSnapshotSource, ModelCategory, ModelRecord } from "./types.js"

type BuildSnapshotInput = {
  records: readonly ModelRecord[]
  fetchedAt: number
  ttlMs: number
  source: CatalogSnapshotSource
}

export const isSnapshotValid = (snapshot: CatalogSnapshot, now: number): boolean => {
  return now - snapshot.fetchedAt < snapshot.ttlMs
}

/**
 * Assembles a complete, frozen snapshot. Nothing mutates a snapshot after this returns;
 * refreshes build a new one and swap it in.
 */
export const buildCatalogSnapshot = (input: BuildSnapshotInput): CatalogSnapshot => {
  const models = new Map<string, ModelRecord>()
  const byCategory: Record<ModelCategory, string[]> = { image: [], video: [], audio: [] }

  for (const record of input.records) {
    if (models.has(record.id)) {
      continue
    }

    models.set(record.id, record)
    const category = CATEGORY_MAPPING[record.category]
    if (category !== undefined) {
      byCategory[category].push(record.id)
    }
  }

  return Object.freeze({
    models,
    aliases: buildAliasMap(models.keys()),
    byCategory: Object.freeze({
      image: Object.freeze(byCategory.image),
      video: Object.freeze(byCategory.video),
      audio: Object.freeze(byCategory.audio),
    }),
    fetchedAt: input.fetchedAt,
    ttlMs: input.ttlMs,
    source: input.source,
  })
}

const buildSeedRecord = (id: string, alias: string, category: string): ModelRecord => {
  return Object.freeze({
    id,
    name: alias,
    description: "",
    category,
    owner: resolveOwner(id),
    thumbnailUrl: null,
    highlighted: false,
    groupKey: null,
    groupLabel: null,
    status: "active",
    tags: Object.freeze([]),
  })
}

/**
 * Minimal catalog used when the platform is unreachable and nothing has been cached yet:
 * the legacy seed models and their aliases, with a short ttl so the next access retries.
 */
export const buildFallbackSnapshot = (fetchedAt: number, ttlMs: number): CatalogSnapshot => {
  return buildCatalogSnapshot({
    records: LEGACY_SEED_MODELS.map((seed) => buildSeedRecord(seed.id, seed.alias, seed.category)),
    fetchedAt,
    ttlMs,
    source: "fallback",
  })
}
