import type { IdentifierState } from "../schemas/index.js";
import { PipelineError } from "./errors.js";

/**
 * Allowed moves per state. Beyond the forward path, the edges back to
 * QUEUED and FETCHED exist for resumption: a cancelled fetch rolls back to
 * QUEUED, and a run that finds an identifier mid-parse rewinds it to
 * FETCHED (artifact still in scratch) or QUEUED (artifact gone).
 */
export const TRANSITIONS: Readonly<
  Record<IdentifierState, readonly IdentifierState[]>
> = {
  QUEUED: ["FETCHING"],
  FETCHING: ["FETCHED", "FETCH_FAILED", "QUEUED"],
  FETCHED: ["PARSING", "QUEUED"],
  FETCH_FAILED: ["QUEUED"],
  PARSING: ["PARSED", "PARSE_FAILED", "FETCHED"],
  PARSED: ["STORED", "FETCHED"],
  PARSE_FAILED: ["QUEUED"],
  STORED: [],
};

export type TerminalState = Extract<
  IdentifierState,
  "STORED" | "FETCH_FAILED" | "PARSE_FAILED"
>;

export function isTerminal(state: IdentifierState): state is TerminalState {
  return (
    state === "STORED" || state === "FETCH_FAILED" || state === "PARSE_FAILED"
  );
}

export function canTransition(
  from: IdentifierState,
  to: IdentifierState,
): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  key: string,
  from: IdentifierState,
  to: IdentifierState,
): void {
  if (!canTransition(from, to)) {
    throw new PipelineError(
      "INVALID_TRANSITION",
      `Cannot move ${key} from ${from} to ${to}`,
      { key, from, to },
    );
  }
}

/**
 * Where a new run picks an identifier up.
 * - skip: already stored
 * - parse: a fetched artifact may still be in scratch (caller verifies)
 * - fetch: start from the queue
 */
export type ResumePoint = "skip" | "parse" | "fetch";

export function resumePoint(state: IdentifierState): ResumePoint {
  switch (state) {
    case "STORED":
      return "skip";
    case "FETCHED":
    case "PARSING":
    case "PARSED":
      return "parse";
    case "QUEUED":
    case "FETCHING":
    case "FETCH_FAILED":
    case "PARSE_FAILED":
      return "fetch";
  }
}
