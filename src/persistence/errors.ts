export type PersistenceErrorCode =
  | "STORE_FAILURE" // underlying SQLite call threw (unreachable, locked, disk full)
  | "CORRUPTED_RECORD"; // stored row failed schema validation on read

/**
 * A failure of scratch storage, the ledger or the corpus store.
 * Treated as systemic by the pipeline: it is never swallowed.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly code: PersistenceErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}
