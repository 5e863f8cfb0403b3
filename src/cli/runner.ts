import type { ExecutionOutcome } from "../execution/index.js"
import type { Engine } from "../runtime/engine.js"
import type { CliCommand } from "./command.js"

export type CommandOutput = {
  lines: string[]
  ok: boolean
}

const formatFallbackNotice = (usedFallback: boolean, reason: string | null): string[] => {
  return usedFallback ? [`# served from cached catalog (${reason ?? "unknown reason"})`] : []
}

const formatOutcome = (outcome: ExecutionOutcome): CommandOutput => {
  if (outcome.kind === "completed") {
    return { lines: [JSON.stringify(outcome.payload, null, 2)], ok: true }
  }

  if (outcome.kind === "failed") {
    return { lines: [outcome.message], ok: false }
  }

  const requestId = outcome.requestId ?? "not submitted"
  return {
    lines: [`Job did not finish within ${outcome.timeoutMs}ms (request ${requestId})`],
    ok: false,
  }
}

/**
 * Executes one parsed command against the engine and renders tab-separated rows for
 * listings and JSON for job payloads.
 */
export const runCommand = async (command: CliCommand, engine: Engine): Promise<CommandOutput> => {
  switch (command.name) {
    case "models": {
      const models = await engine.registry.listModels({
        category: command.category,
        search: command.search,
        limit: command.limit,
      })
      return {
        lines: models.map((model) => `${model.id}\t${model.name}\t${model.category}`),
        ok: true,
      }
    }
    case "resolve": {
      return { lines: [await engine.registry.resolve(command.model)], ok: true }
    }
    case "search": {
      const result = await engine.registry.search(command.query, command.category, command.limit)
      return {
        lines: [
          ...formatFallbackNotice(result.usedFallback, result.fallbackReason),
          ...result.models.map((model) => `${model.id}\t${model.name}\t${model.category}`),
        ],
        ok: true,
      }
    }
    case "recommend": {
      const result = await engine.registry.recommend(command.task, command.category, command.limit)
      return {
        lines: [
          ...formatFallbackNotice(result.usedFallback, result.fallbackReason),
          ...result.recommendations.map(
            (entry) => `${entry.score.toFixed(3)}\t${entry.modelId}\t${entry.reason}`
          ),
        ],
        ok: true,
      }
    }
    case "run": {
      if (command.fast) {
        const payload = await engine.runFast(command.model, command.args)
        return { lines: [JSON.stringify(payload, null, 2)], ok: true }
      }

      return formatOutcome(await engine.run(command.model, command.args, command.timeoutMs))
    }
  }
}
