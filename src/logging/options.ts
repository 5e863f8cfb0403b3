import pino, { type LoggerOptions, type TransportSingleOptions } from "pino"

export type RuntimeEnv = "development" | "test" | "production"

export type LogDestination = 1 | 2

type BuildLoggerOptionsInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
  destination?: LogDestination
}

const buildPrettyTransport = (destination: LogDestination): TransportSingleOptions => {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      singleLine: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      destination,
    },
  }
}

/**
 * Maps NODE_ENV onto the three environments the logger policy knows about; anything
 * unrecognized is treated as development.
 *
 * @param value Optional environment value, defaulting to NODE_ENV.
 */
export const resolveRuntimeEnv = (value = process.env.NODE_ENV): RuntimeEnv => {
  if (value === "production") {
    return "production"
  }

  if (value === "test") {
    return "test"
  }

  return "development"
}

/**
 * Builds the pino options shared by the CLI and embedders: debug level in development,
 * info elsewhere, ISO timestamps and a `service` field on every record. `destination` is the
 * file descriptor pretty output goes to.
 *
 * @param input Optional overrides for env, level, and service naming.
 */
export const buildLoggerOptions = ({
  env = resolveRuntimeEnv(),
  logLevel,
  serviceName = "genmedia",
  prettyLogs = false,
  destination = 1,
}: BuildLoggerOptionsInput = {}): LoggerOptions => {
  const level = logLevel ?? (env === "development" ? "debug" : "info")
  const shouldUsePrettyTransport = env === "development" && prettyLogs

  return {
    name: serviceName,
    level,
    base: {
      service: serviceName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: shouldUsePrettyTransport ? buildPrettyTransport(destination) : undefined,
  }
}
