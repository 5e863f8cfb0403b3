export class JobTimeoutError extends Error {
  modelId: string
  timeoutMs: number

  constructor(modelId: string, timeoutMs: number) {
    super(`Job for ${modelId} did not finish within ${timeoutMs}ms`)
    this.name = "JobTimeoutError"
    this.modelId = modelId
    this.timeoutMs = timeoutMs
  }
}
