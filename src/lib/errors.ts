/**
 * Error types the pipeline distinguishes when deciding what to recover from
 */

/**
 * A language-model request failed (network, timeout, API error). Recoverable
 * per evaluation batch.
 */
export class LlmRequestError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LlmRequestError";
  }
}

export class PipelineAlreadyRunningError extends Error {
  constructor(readonly activeJobId: string) {
    super(`Pipeline is already running (job ${activeJobId})`);
    this.name = "PipelineAlreadyRunningError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
