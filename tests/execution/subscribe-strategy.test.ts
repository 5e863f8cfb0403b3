import { describe, expect, it, vi } from "vitest"

import { JobTimeoutError } from "../../src/execution/errors.js"
import { createSubscribeStrategy } from "../../src/execution/subscribe-strategy.js"
import type { JobArguments, JobCompletion } from "../../src/execution/types.js"
import { createLoggerStub } from "../fixtures.js"

type Subscribe = (
  modelId: string,
  args: JobArguments,
  signal: AbortSignal
) => Promise<JobCompletion>

const createGateway = () => {
  return {
    subscribe: vi.fn<Subscribe>(),
    run: vi.fn(async () => ({ text: "direct" })),
  }
}

describe("createSubscribeStrategy", () => {
  it("returns the streamed completion", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.subscribe.mockResolvedValue({
      status: "completed",
      payload: { audio: { url: "https://example.test/song.wav" } },
      requestId: "req-3",
    })
    const strategy = createSubscribeStrategy({ gateway, logger: createLoggerStub() })

    // Act
    const outcome = await strategy.execute("fal-ai/musicgen-medium", { prompt: "jazz" }, 5_000)

    // Assert
    expect(outcome).toEqual({
      kind: "completed",
      payload: { audio: { url: "https://example.test/song.wav" } },
      requestId: "req-3",
    })
    expect(gateway.subscribe).toHaveBeenCalledWith(
      "fal-ai/musicgen-medium",
      { prompt: "jazz" },
      expect.any(AbortSignal)
    )
  })

  it("returns failed outcomes without a request id when the job never enqueued", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.subscribe.mockResolvedValue({
      status: "failed",
      message: "Job failed (HTTP 401): Unauthorized",
      requestId: null,
    })
    const strategy = createSubscribeStrategy({ gateway, logger: createLoggerStub() })

    // Act
    const outcome = await strategy.execute("fal-ai/musicgen-medium", {}, 5_000)

    // Assert
    expect(outcome).toEqual({
      kind: "failed",
      message: "Job failed (HTTP 401): Unauthorized",
      requestId: null,
    })
  })

  it("raises JobTimeoutError and aborts the subscription on timeout", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.subscribe.mockImplementation(
      (_modelId, _args, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")))
        })
    )
    const logger = createLoggerStub()
    const strategy = createSubscribeStrategy({ gateway, logger })

    // Act
    const execution = strategy.execute("fal-ai/musicgen-medium", {}, 20)

    // Assert
    await expect(execution).rejects.toBeInstanceOf(JobTimeoutError)
    await expect(execution).rejects.toThrow(
      "Job for fal-ai/musicgen-medium did not finish within 20ms"
    )
    expect(gateway.subscribe.mock.calls[0][2].aborted).toBe(true)
    expect(logger.warn).toHaveBeenCalledWith(
      { modelId: "fal-ai/musicgen-medium", timeoutMs: 20 },
      "Subscribed job timed out"
    )
  })

  it("runs fast jobs directly", async () => {
    // Arrange
    const gateway = createGateway()
    const strategy = createSubscribeStrategy({ gateway, logger: createLoggerStub() })

    // Act / Assert
    await expect(strategy.executeFast("fal-ai/any-llm", { prompt: "hi" })).resolves.toEqual({
      text: "direct",
    })
  })
})
