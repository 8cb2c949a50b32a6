export type ScratchErrorCode =
  | "DATA_TOO_LARGE" // artifact exceeds the configured byte limit
  | "INVALID_REQUEST"; // empty key or unusable entry

export class ScratchError extends Error {
  constructor(
    public readonly code: ScratchErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ScratchError";
  }
}
