import pino from "pino"
import { describe, expect, it, vi } from "vitest"

import { runCommand } from "../../src/cli/runner.js"
import { resolveEngineConfig } from "../../src/config/engine-config.js"
import type { FalClientLike } from "../../src/execution/index.js"
import type { QueryValue } from "../../src/platform/client.js"
import { PlatformRequestError } from "../../src/platform/errors.js"
import { createEngine } from "../../src/runtime/engine.js"

const CATALOG_PAGE = {
  models: [
    { endpoint_id: "fal-ai/flux/dev", title: "FLUX dev", category: "text-to-image" },
    { endpoint_id: "fal-ai/kling-video", title: "Kling", category: "text-to-video" },
  ],
}

const setup = (strategy = "subscribe") => {
  const getJson = vi.fn(async (_endpoint: string, query: Record<string, QueryValue> = {}) => {
    if (query.q !== undefined) {
      throw new PlatformRequestError("timeout", "search timed out")
    }

    return CATALOG_PAGE
  })
  const subscribe = vi.fn<FalClientLike["subscribe"]>(async () => ({
    data: { images: [{ url: "https://example.test/cat.png" }] },
    requestId: "req-1",
  }))
  const falClient: FalClientLike = {
    run: vi.fn(async () => ({ data: { text: "fast" }, requestId: "req-run" })),
    subscribe,
    queue: {
      submit: vi.fn(async () => ({ request_id: "req-2" })),
      status: vi.fn(async () => ({ status: "FAILED" })),
      subscribeToStatus: vi.fn(async () => ({ status: "COMPLETED" })),
      result: vi.fn(async () => ({ data: {}, requestId: "req-2" })),
    },
  }
  const engine = createEngine(
    resolveEngineConfig({ GENMEDIA_EXECUTION_STRATEGY: strategy }),
    pino({ level: "silent" }),
    { platformClient: { getJson }, falClient }
  )

  return { engine, subscribe }
}

describe("runCommand", () => {
  it("prints catalog rows for models", async () => {
    // Arrange
    const { engine } = setup()

    // Act
    const output = await runCommand({ name: "models", category: "image", limit: 50 }, engine)

    // Assert
    expect(output).toEqual({ lines: ["fal-ai/flux/dev\tFLUX dev\ttext-to-image"], ok: true })
  })

  it("prints the resolved model id", async () => {
    // Arrange
    const { engine } = setup()

    // Act
    const output = await runCommand({ name: "resolve", model: "sdxl" }, engine)

    // Assert
    expect(output).toEqual({ lines: ["fal-ai/fast-sdxl"], ok: true })
  })

  it("flags search results served from the cached catalog", async () => {
    // Arrange
    const { engine } = setup()

    // Act
    const output = await runCommand({ name: "search", query: "flux", limit: 10 }, engine)

    // Assert
    expect(output.lines).toEqual([
      "# served from cached catalog (API timeout)",
      "fal-ai/flux/dev\tFLUX dev\ttext-to-image",
    ])
  })

  it("prints scored recommendations", async () => {
    // Arrange
    const { engine } = setup()

    // Act
    const output = await runCommand({ name: "recommend", task: "kling", limit: 3 }, engine)

    // Assert
    expect(output.lines).toEqual([
      "# served from cached catalog (API timeout)",
      "1.000\tfal-ai/kling-video\ttext-to-video model",
    ])
  })

  it("prints job payloads as JSON", async () => {
    // Arrange
    const { engine, subscribe } = setup()

    // Act
    const output = await runCommand(
      { name: "run", model: "flux_dev", args: { prompt: "a cat" }, timeoutMs: 5_000, fast: false },
      engine
    )

    // Assert
    expect(subscribe).toHaveBeenCalledWith(
      "fal-ai/flux/dev",
      expect.objectContaining({ input: { prompt: "a cat" } })
    )
    expect(output.ok).toBe(true)
    expect(JSON.parse(output.lines[0])).toEqual({
      images: [{ url: "https://example.test/cat.png" }],
    })
  })

  it("marks failed jobs as unsuccessful", async () => {
    // Arrange
    const { engine } = setup("polling")

    // Act
    const output = await runCommand(
      { name: "run", model: "fal-ai/flux/dev", args: {}, timeoutMs: 5_000, fast: false },
      engine
    )

    // Assert
    expect(output).toEqual({ lines: ["Job failed: FAILED"], ok: false })
  })

  it("runs fast jobs directly", async () => {
    // Arrange
    const { engine } = setup()

    // Act
    const output = await runCommand(
      { name: "run", model: "fal-ai/any-llm", args: {}, fast: true },
      engine
    )

    // Assert
    expect(output).toEqual({ lines: [JSON.stringify({ text: "fast" }, null, 2)], ok: true })
  })
})
