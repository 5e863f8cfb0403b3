import { describe, expect, it } from "vitest"

import { parseCommand } from "../../src/cli/command.js"

describe("parseCommand", () => {
  it("parses models with filters", () => {
    expect(parseCommand(["models", "--category", "video", "--limit", "5"])).toEqual({
      name: "models",
      category: "video",
      search: undefined,
      limit: 5,
    })
  })

  it("defaults the models limit", () => {
    expect(parseCommand(["models"])).toEqual({ name: "models", limit: 50 })
  })

  it("parses resolve", () => {
    expect(parseCommand(["resolve", "flux_dev"])).toEqual({ name: "resolve", model: "flux_dev" })
  })

  it("parses recommend with its own default limit", () => {
    expect(parseCommand(["recommend", "make a poster", "--category", "image"])).toEqual({
      name: "recommend",
      task: "make a poster",
      category: "image",
      limit: 5,
    })
  })

  it("parses run arguments as a JSON object", () => {
    expect(parseCommand(["run", "flux_dev", '{"prompt":"a cat"}', "--timeout", "5000"])).toEqual(
      {
        name: "run",
        model: "flux_dev",
        args: { prompt: "a cat" },
        timeoutMs: 5_000,
        fast: false,
      }
    )
  })

  it("defaults run arguments to an empty object", () => {
    expect(parseCommand(["run", "flux_dev", "--fast"])).toEqual({
      name: "run",
      model: "flux_dev",
      args: {},
      timeoutMs: undefined,
      fast: true,
    })
  })

  it("throws when no command is given", () => {
    expect(() => parseCommand([])).toThrow("Missing command")
  })

  it("throws for unknown commands", () => {
    expect(() => parseCommand(["unknown"])).toThrow("unknown command")
  })

  it("throws for run arguments that are not an object", () => {
    expect(() => parseCommand(["run", "flux_dev", "[1, 2]"])).toThrow(
      "Job arguments must be a JSON object."
    )
  })

  it("throws for timeouts longer than a timer can wait", () => {
    expect(() => parseCommand(["run", "flux_dev", "--timeout", "2592000000"])).toThrow(
      "Expected at most 2147483647 milliseconds."
    )
  })

  it("throws for unknown categories", () => {
    expect(() => parseCommand(["models", "--category", "text"])).toThrow("Unknown category: text")
  })
})
