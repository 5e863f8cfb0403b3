import pino, { type Logger } from "pino"

import {
  buildLoggerOptions,
  resolveRuntimeEnv,
  type LogDestination,
  type RuntimeEnv,
} from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
  destination?: LogDestination
}

/**
 * Creates a pino logger from the shared option policy. The CLI logs to stderr so stdout
 * carries only command output. The level comes from `input.logLevel` or the runtime env
 * default; the entrypoint applies a configured level once the environment is validated.
 *
 * @param input Optional logger overrides for embedding and tests.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const destination = input.destination ?? 1
  const prettyLogs = input.prettyLogs ?? process.env.GENMEDIA_PRETTY_LOGS === "1"
  const options = buildLoggerOptions({
    env,
    logLevel: input.logLevel,
    serviceName: input.serviceName,
    prettyLogs,
    destination,
  })

  if (options.transport) {
    return pino(options)
  }

  return pino(options, pino.destination(destination))
}

/**
 * Child logger tagged with a `component` field so catalog, search and execution records
 * can be told apart in one stream.
 */
export const createComponentLogger = (component: string, parent: Logger): Logger => {
  return parent.child({ component })
}
