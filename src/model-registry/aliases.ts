export const MODEL_ID_SEPARATOR = "/"

const ROOT_OWNER_PREFIX = "fal-ai/"

export type SeedModel = {
  alias: string
  id: string
  category: string
}

/**
 * Short names that predate the dynamic catalog. They are registered before any generated
 * alias and double as the offline catalog when the platform cannot be reached.
 */
export const LEGACY_SEED_MODELS: readonly SeedModel[] = [
  { alias: "flux_schnell", id: "fal-ai/flux/schnell", category: "text-to-image" },
  { alias: "flux_dev", id: "fal-ai/flux/dev", category: "text-to-image" },
  { alias: "flux_pro", id: "fal-ai/flux-pro", category: "text-to-image" },
  { alias: "sdxl", id: "fal-ai/fast-sdxl", category: "text-to-image" },
  { alias: "stable_diffusion", id: "fal-ai/stable-diffusion-v3-medium", category: "text-to-image" },
  { alias: "svd", id: "fal-ai/stable-video-diffusion", category: "image-to-video" },
  { alias: "animatediff", id: "fal-ai/fast-animatediff", category: "text-to-video" },
  { alias: "kling", id: "fal-ai/kling-video", category: "text-to-video" },
  { alias: "musicgen", id: "fal-ai/musicgen-medium", category: "text-to-audio" },
  { alias: "musicgen_large", id: "fal-ai/musicgen-large", category: "text-to-audio" },
  { alias: "bark", id: "fal-ai/bark", category: "text-to-speech" },
  { alias: "whisper", id: "fal-ai/whisper", category: "speech-to-text" },
]

export const isCanonicalModelId = (input: string): boolean => {
  return input.includes(MODEL_ID_SEPARATOR)
}

/**
 * Derives a snake_case alias for ids owned by the root namespace, e.g.
 * `fal-ai/flux-pro/v1.1` becomes `flux_pro_v1.1`. Other owners get no alias.
 */
export const generateAlias = (modelId: string): string | null => {
  if (!modelId.startsWith(ROOT_OWNER_PREFIX)) {
    return null
  }

  const alias = modelId.slice(ROOT_OWNER_PREFIX.length).replaceAll("/", "_").replaceAll("-", "_")
  return alias.length > 0 ? alias : null
}

/**
 * Builds the alias table for a snapshot. Legacy aliases go in first and generated aliases
 * never replace an existing entry, so the first registration of a name wins.
 */
export const buildAliasMap = (modelIds: Iterable<string>): Map<string, string> => {
  const aliases = new Map<string, string>()
  for (const seed of LEGACY_SEED_MODELS) {
    aliases.set(seed.alias, seed.id)
  }

  for (const modelId of modelIds) {
    const alias = generateAlias(modelId)
    if (alias !== null && !aliases.has(alias)) {
      aliases.set(alias, modelId)
    }
  }

  return aliases
}
