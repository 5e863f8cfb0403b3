#!/usr/bin/env node
import { parseCommand } from "./cli/command.js"
import { runCommand } from "./cli/runner.js"
import { resolveEngineConfig } from "./config/engine-config.js"
import { createComponentLogger, createLogger } from "./logging/logger.js"
import { createEngine } from "./runtime/engine.js"

const logger = createLogger({ destination: 2 })

const main = async (): Promise<void> => {
  const command = parseCommand(process.argv.slice(2))
  const config = resolveEngineConfig()
  if (config.logLevel !== null) {
    logger.level = config.logLevel
  }

  const engine = createEngine(config, logger)
  const output = await runCommand(command, engine)
  for (const line of output.lines) {
    process.stdout.write(`${line}\n`)
  }

  if (!output.ok) {
    process.exitCode = 1
  }

  createComponentLogger("cli", logger).debug({ command: command.name }, "Command finished")
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, "Command failed")
  process.exitCode = 1
})
