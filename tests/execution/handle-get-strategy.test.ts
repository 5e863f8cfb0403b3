import { describe, expect, it, vi } from "vitest"

import { createHandleGetStrategy } from "../../src/execution/handle-get-strategy.js"
import type { JobCompletion, JobHandle, JobSubmission } from "../../src/execution/types.js"
import { createLoggerStub } from "../fixtures.js"

const HANDLE: JobHandle = { modelId: "fal-ai/kling-video", requestId: "req-7" }

const createGateway = () => {
  return {
    submit: vi.fn(async (): Promise<JobSubmission> => ({ status: "submitted", handle: HANDLE })),
    waitForResult: vi.fn<(handle: JobHandle, signal: AbortSignal) => Promise<JobCompletion>>(),
    run: vi.fn(async () => ({})),
  }
}

const waitUntilAborted = (_handle: JobHandle, signal: AbortSignal): Promise<JobCompletion> => {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")))
  })
}

describe("createHandleGetStrategy", () => {
  it("returns the awaited completion", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.waitForResult.mockResolvedValue({
      status: "completed",
      payload: { video: { url: "https://example.test/clip.mp4" } },
      requestId: "req-7",
    })
    const strategy = createHandleGetStrategy({ gateway, logger: createLoggerStub() })

    // Act
    const outcome = await strategy.execute("fal-ai/kling-video", { prompt: "waves" }, 5_000)

    // Assert
    expect(outcome).toEqual({
      kind: "completed",
      payload: { video: { url: "https://example.test/clip.mp4" } },
      requestId: "req-7",
    })
    expect(gateway.waitForResult).toHaveBeenCalledWith(HANDLE, expect.any(AbortSignal))
  })

  it("maps failed completions to failed outcomes", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.waitForResult.mockResolvedValue({
      status: "failed",
      message: "Job failed (HTTP 422): invalid prompt",
      requestId: "req-7",
    })
    const strategy = createHandleGetStrategy({ gateway, logger: createLoggerStub() })

    // Act
    const outcome = await strategy.execute("fal-ai/kling-video", {}, 5_000)

    // Assert
    expect(outcome).toEqual({
      kind: "failed",
      message: "Job failed (HTTP 422): invalid prompt",
      requestId: "req-7",
    })
  })

  it("returns a failed outcome when the platform rejects the submission", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.submit.mockResolvedValue({
      status: "rejected",
      message: "Job failed (HTTP 404): Not Found",
    })
    const strategy = createHandleGetStrategy({ gateway, logger: createLoggerStub() })

    // Act
    const outcome = await strategy.execute("fal-ai/does-not-exist", {}, 5_000)

    // Assert
    expect(outcome).toEqual({
      kind: "failed",
      message: "Job failed (HTTP 404): Not Found",
      requestId: null,
    })
    expect(gateway.waitForResult).not.toHaveBeenCalled()
  })

  it("aborts the wait and returns timed_out when the deadline passes", async () => {
    // Arrange
    const gateway = createGateway()
    gateway.waitForResult.mockImplementation(waitUntilAborted)
    const logger = createLoggerStub()
    const strategy = createHandleGetStrategy({ gateway, logger })

    // Act
    const outcome = await strategy.execute("fal-ai/kling-video", {}, 20)

    // Assert
    expect(outcome).toEqual({ kind: "timed_out", timeoutMs: 20, requestId: "req-7" })
    const signal = gateway.waitForResult.mock.calls[0][1]
    expect(signal.aborted).toBe(true)
    expect(logger.warn).toHaveBeenCalledWith(
      { modelId: "fal-ai/kling-video", requestId: "req-7", timeoutMs: 20 },
      "Awaited job timed out"
    )
  })
})
