import { describe, expect, it, vi } from "vitest"

import { createDeadline, raceWithTimeout } from "../../src/execution/timing.js"

describe("raceWithTimeout", () => {
  it("returns the value when work settles first", async () => {
    // Arrange
    const onTimeout = vi.fn()

    // Act
    const result = await raceWithTimeout(Promise.resolve(42), 1_000, onTimeout)

    // Assert
    expect(result).toEqual({ settled: true, value: 42 })
    expect(onTimeout).not.toHaveBeenCalled()
  })

  it("reports a timeout and runs the timeout hook", async () => {
    // Arrange
    const onTimeout = vi.fn()
    const never = new Promise<number>(() => undefined)

    // Act
    const result = await raceWithTimeout(never, 5, onTimeout)

    // Assert
    expect(result).toEqual({ settled: false })
    expect(onTimeout).toHaveBeenCalledOnce()
  })

  it("waits for work when the limit exceeds the largest timer delay", async () => {
    // Arrange
    const work = new Promise<string>((resolve) => {
      setTimeout(() => resolve("done"), 20)
    })

    // Act
    const result = await raceWithTimeout(work, 30 * 24 * 60 * 60 * 1000)

    // Assert
    expect(result).toEqual({ settled: true, value: "done" })
  })

  it("propagates rejections that happen before the timeout", async () => {
    await expect(raceWithTimeout(Promise.reject(new Error("boom")), 1_000)).rejects.toThrow(
      "boom"
    )
  })
})

describe("createDeadline", () => {
  it("counts down against the clock and never goes negative", () => {
    // Arrange
    let current = 100
    const deadline = createDeadline({ now: () => current, sleep: async () => undefined }, 1_000)

    // Act / Assert
    expect(deadline.remainingMs()).toBe(1_000)
    current = 700
    expect(deadline.remainingMs()).toBe(400)
    expect(deadline.expired()).toBe(false)
    current = 5_000
    expect(deadline.remainingMs()).toBe(0)
    expect(deadline.expired()).toBe(true)
  })
})
