export type QueueErrorCode =
  | "EMPTY_IDENTIFIER"; // nothing left after trimming and prefix removal

export class QueueError extends Error {
  constructor(
    public readonly code: QueueErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "QueueError";
  }
}
