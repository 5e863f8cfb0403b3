import { vi } from "vitest"

import type { ModelRecord } from "../src/model-registry/types.js"

export const buildModelRecord = (overrides: Partial<ModelRecord> & { id: string }): ModelRecord => {
  return {
    name: overrides.id,
    description: "",
    category: "",
    owner: "fal-ai",
    thumbnailUrl: null,
    highlighted: false,
    groupKey: null,
    groupLabel: null,
    status: "active",
    tags: [],
    ...overrides,
  }
}

export const createLoggerStub = () => {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }
}

/**
 * Clock whose sleeps return immediately and advance time by the requested amount.
 */
export const createFakeClock = () => {
  let current = 0
  const sleeps: number[] = []

  return {
    sleeps,
    clock: {
      now: () => current,
      sleep: async (ms: number) => {
        sleeps.push(ms)
        current += ms
      },
    },
  }
}
