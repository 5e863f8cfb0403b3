export class UnknownAliasError extends Error {
  alias: string

  constructor(alias: string) {
    super(`Unknown model alias: ${alias}`)
    this.name = "UnknownAliasError"
    this.alias = alias
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "MalformedResponseError"
  }
}
