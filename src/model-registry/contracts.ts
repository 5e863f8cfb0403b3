import { z } from "zod"

import type { ModelCategory } from "./types.js"

/**
 * Platform categories folded into the three capability groups handlers work with.
 */
export const CATEGORY_MAPPING: Readonly<Record<string, ModelCategory>> = {
  "text-to-image": "image",
  "image-to-image": "image",
  "text-to-video": "video",
  "image-to-video": "video",
  "video-to-video": "video",
  audio: "audio",
  "text-to-audio": "audio",
  "speech-to-text": "audio",
  "text-to-speech": "audio",
  "audio-to-audio": "audio",
}

export const SEARCH_CATEGORY_BY_HINT: Readonly<Record<ModelCategory, string>> = {
  image: "text-to-image",
  video: "text-to-video",
  audio: "text-to-audio",
}

export const modelCategorySchema = z.enum(["image", "video", "audio"])

const looseString = z.string().optional().catch(undefined)

const rawMetadataSchema = z
  .object({
    display_name: looseString,
    description: looseString,
    category: looseString,
    thumbnail_url: z.string().nullable().optional().catch(undefined),
    tags: z.array(z.unknown()).optional().catch(undefined),
    status: looseString,
  })
  .passthrough()

const rawGroupSchema = z
  .object({
    key: looseString,
    label: looseString,
  })
  .passthrough()

export const rawModelSchema = z
  .object({
    endpoint_id: looseString,
    id: looseString,
    title: looseString,
    name: looseString,
    description: looseString,
    category: looseString,
    thumbnail_url: z.string().nullable().optional().catch(undefined),
    metadata: rawMetadataSchema.nullable().optional().catch(undefined),
    group: rawGroupSchema.nullable().optional().catch(undefined),
    highlighted: z.boolean().optional().catch(undefined),
    status: looseString,
  })
  .passthrough()

export type RawModel = z.infer<typeof rawModelSchema>

export const modelsPageSchema = z
  .object({
    models: z.unknown().optional(),
    items: z.unknown().optional(),
    next_cursor: z.string().nullable().optional().catch(undefined),
    has_more: z.boolean().optional().catch(undefined),
  })
  .passthrough()

export const pricingResponseSchema = z
  .object({
    prices: z
      .array(
        z
          .object({
            endpoint_id: z.string(),
            unit_price: z.number().optional(),
            unit: z.string().optional(),
            currency: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough()

export const usageResponseSchema = z
  .object({
    total_cost: z.number().optional(),
    currency: z.string().optional(),
    breakdown: z
      .array(
        z
          .object({
            endpoint_id: z.string(),
            quantity: z.number().optional(),
            cost: z.number().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough()

export type PricingResponse = z.infer<typeof pricingResponseSchema>
export type UsageResponse = z.infer<typeof usageResponseSchema>
