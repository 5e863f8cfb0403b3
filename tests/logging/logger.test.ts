import { afterEach, describe, expect, it, vi } from "vitest"

import { createComponentLogger, createLogger } from "../../src/logging/logger.js"

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("ignores the raw level variable until configuration is validated", () => {
    // Arrange
    vi.stubEnv("GENMEDIA_LOG_LEVEL", "verbose")

    // Act
    const logger = createLogger({ env: "production" })

    // Assert
    expect(logger.level).toBe("info")
  })

  it("uses an explicit level", () => {
    // Act
    const logger = createLogger({ env: "production", logLevel: "warn", destination: 2 })

    // Assert
    expect(logger.level).toBe("warn")
  })
})

describe("createComponentLogger", () => {
  it("tags child records with the component name", () => {
    // Arrange
    const parent = createLogger({ env: "test", logLevel: "silent" })

    // Act
    const logger = createComponentLogger("model-catalog", parent)

    // Assert
    expect(logger.bindings()).toMatchObject({ component: "model-catalog" })
  })
})
