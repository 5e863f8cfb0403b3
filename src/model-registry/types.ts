export type ModelCategory = "image" | "video" | "audio"

export type ModelStatus = "active" | "deprecated"

export type ModelRecord = Readonly<{
  id: string
  name: string
  description: string
  category: string
  owner: string
  thumbnailUrl: string | null
  highlighted: boolean
  groupKey: string | null
  groupLabel: string | null
  status: ModelStatus
  tags: readonly string[]
}>

export type CatalogSnapshotSource = "network" | "fallback"

export type CatalogSnapshot = Readonly<{
  models: ReadonlyMap<string, ModelRecord>
  aliases: ReadonlyMap<string, string>
  byCategory: Readonly<Record<ModelCategory, readonly string[]>>
  fetchedAt: number
  ttlMs: number
  source: CatalogSnapshotSource
}>

export type SearchResult = {
  models: ModelRecord[]
  usedFallback: boolean
  fallbackReason: string | null
}

export type Recommendation = {
  modelId: string
  name: string
  description: string
  category: string
  highlighted: boolean
  group: string | null
  score: number
  reason: string
}

export type RecommendResult = {
  recommendations: Recommendation[]
  usedFallback: boolean
  fallbackReason: string | null
}
