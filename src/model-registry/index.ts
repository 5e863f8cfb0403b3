export { LEGACY_SEED_MODELS, buildAliasMap, generateAlias, isCanonicalModelId } from "./aliases.js"
export { createCatalogCache, type CatalogCache } from "./catalog-cache.js"
export {
  createCatalogFetcher,
  normalizeModelRecord,
  parseModelsPage,
  type CatalogFetcher,
} from "./catalog-fetcher.js"
export { CATEGORY_MAPPING, type PricingResponse, type UsageResponse } from "./contracts.js"
export { MalformedResponseError, UnknownAliasError } from "./errors.js"
export {
  createModelRegistry,
  DEFAULT_LIST_LIMIT,
  type ListModelsInput,
  type ModelRegistry,
  type UsageInput,
} from "./registry.js"
export { createModelSearch, type ModelSearch } from "./search.js"
export { buildCatalogSnapshot, buildFallbackSnapshot, isSnapshotValid } from "./snapshot.js"
export type {
  CatalogSnapshot,
  ModelCategory,
  ModelRecord,
  Recommendation,
  RecommendResult,
  SearchResult,
} from "./types.js"
