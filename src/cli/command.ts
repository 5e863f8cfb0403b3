import { Command, CommanderError, InvalidArgumentError } from "commander"
import { z } from "zod"

import type { JobArguments } from "../execution/index.js"
import { MAX_TIMER_DELAY_MS } from "../execution/timing.js"
import { modelCategorySchema } from "../model-registry/contracts.js"
import type { ModelCategory } from "../model-registry/types.js"

export const VALID_COMMANDS = ["models", "resolve", "search", "recommend", "run"] as const

export type CliCommand =
  | { name: "models"; category?: ModelCategory; search?: string; limit: number }
  | { name: "resolve"; model: string }
  | { name: "search"; query: string; category?: string; limit: number }
  | { name: "recommend"; task: string; category?: string; limit: number }
  | { name: "run"; model: string; args: JobArguments; timeoutMs?: number; fast: boolean }

const jobArgumentsSchema = z.record(z.unknown())

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.")
  }

  return parsed
}

const parseTimeout = (value: string): number => {
  const parsed = parsePositiveInt(value)
  if (parsed > MAX_TIMER_DELAY_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMER_DELAY_MS} milliseconds.`)
  }

  return parsed
}

const parseCategory = (value: string): ModelCategory => {
  const parsed = modelCategorySchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Unknown category: ${value}. Valid categories: ${modelCategorySchema.options.join(", ")}`
    )
  }

  return parsed.data
}

const parseJobArguments = (value: string): JobArguments => {
  let decoded: unknown
  try {
    decoded = JSON.parse(value)
  } catch {
    throw new InvalidArgumentError("Job arguments must be valid JSON.")
  }

  const parsed = jobArgumentsSchema.safeParse(decoded)
  if (!parsed.success) {
    throw new InvalidArgumentError("Job arguments must be a JSON object.")
  }

  return parsed.data
}

type ListOptions = { category?: ModelCategory; search?: string; limit: number }
type SearchOptions = { category?: string; limit: number }
type RunOptions = { timeout?: number; fast?: boolean }

/**
 * Parses CLI arguments into one typed command. Commander errors are rethrown as plain
 * errors so the entrypoint reports every failure the same way.
 *
 * @param argv Raw user arguments from process argv.
 */
export const parseCommand = (argv: string[]): CliCommand => {
  if (argv.length === 0) {
    throw new Error(`Missing command. Valid commands: ${VALID_COMMANDS.join(", ")}`)
  }

  const selected: { command: CliCommand | null } = { command: null }
  const parser = new Command("genmedia")

  parser.exitOverride().allowUnknownOption(false).allowExcessArguments(false)

  parser
    .command("models")
    .description("list catalog models")
    .option("--category <category>", "image, video or audio", parseCategory)
    .option("--search <text>", "substring filter on name, description and id")
    .option("--limit <count>", "maximum number of models", parsePositiveInt, 50)
    .action((options: ListOptions) => {
      selected.command = {
        name: "models",
        category: options.category,
        search: options.search,
        limit: options.limit,
      }
    })

  parser
    .command("resolve")
    .description("resolve an alias to its model id")
    .argument("<model>", "alias or model id")
    .action((model: string) => {
      selected.command = { name: "resolve", model }
    })

  parser
    .command("search")
    .description("search models")
    .argument("<query>", "free-text query")
    .option("--category <category>", "image, video, audio or a platform category")
    .option("--limit <count>", "maximum number of models", parsePositiveInt, 50)
    .action((query: string, options: SearchOptions) => {
      selected.command = {
        name: "search",
        query,
        category: options.category,
        limit: options.limit,
      }
    })

  parser
    .command("recommend")
    .description("recommend models for a task")
    .argument("<task>", "task description")
    .option("--category <category>", "image, video, audio or a platform category")
    .option("--limit <count>", "maximum number of recommendations", parsePositiveInt, 5)
    .action((task: string, options: SearchOptions) => {
      selected.command = {
        name: "recommend",
        task,
        category: options.category,
        limit: options.limit,
      }
    })

  parser
    .command("run")
    .description("run a model job")
    .argument("<model>", "alias or model id")
    .argument("[args]", "job arguments as a JSON object", parseJobArguments, {})
    .option("--timeout <ms>", "job timeout in milliseconds", parseTimeout)
    .option("--fast", "run synchronously without queueing")
    .action((model: string, args: JobArguments, options: RunOptions) => {
      selected.command = {
        name: "run",
        model,
        args,
        timeoutMs: options.timeout,
        fast: options.fast === true,
      }
    })

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new Error(error.message)
    }

    throw error
  }

  if (selected.command === null) {
    throw new Error(`Missing command. Valid commands: ${VALID_COMMANDS.join(", ")}`)
  }

  return selected.command
}
