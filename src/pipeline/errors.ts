export type PipelineErrorCode =
  | "CANCELLED" // run-level signal aborted before the work started
  | "INVALID_TRANSITION"; // ledger asked to move between unrelated states

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}
