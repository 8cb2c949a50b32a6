import type { UpsertResult } from "../corpus/index.js";
import { type Logger, componentLogger } from "../logger.js";
import type { FetchOutcome, ParseFailure } from "../schemas/index.js";
import type { TerminalState } from "./states.js";

/** Final state of one identifier in one run. */
export interface OutcomeRecord {
  identifier: string;
  key: string;
  batch: string;
  run_id: string;
  state: TerminalState;
  skipped: boolean; // already STORED by an earlier run
  fetch?: FetchOutcome;
  parse_failure?: ParseFailure;
  corpus?: UpsertResult;
  confidence?: number;
}

export interface OutcomeReporter {
  report(record: OutcomeRecord): void | Promise<void>;
}

/**
 * Human-readable reasons behind a failed record, one per line of the run
 * report. Fetch failures list every route attempted, in order.
 */
export function failureReasons(record: OutcomeRecord): string[] {
  if (record.state === "PARSE_FAILED" && record.parse_failure) {
    return [`${record.parse_failure.code}: ${record.parse_failure.message}`];
  }
  if (record.state === "FETCH_FAILED" && record.fetch?.status === "FAILED") {
    return [
      record.fetch.reason,
      ...record.fetch.attempts.map((a) => {
        const tries = a.attempts === 1 ? "1 attempt" : `${a.attempts} attempts`;
        const detail = a.detail ? `, ${a.detail}` : "";
        return `${a.route}: ${a.result} (${tries}${detail})`;
      }),
    ];
  }
  return [];
}

export class LoggingReporter implements OutcomeReporter {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = componentLogger("outcomes", logger);
  }

  report(record: OutcomeRecord): void {
    const fields = {
      identifier: record.key,
      batch: record.batch,
      run_id: record.run_id,
      state: record.state,
    };
    if (record.state === "STORED") {
      this.log.info(
        {
          ...fields,
          skipped: record.skipped,
          fetch_status: record.fetch?.status,
          version: record.corpus?.version,
          changed: record.corpus?.changed,
          confidence: record.confidence,
        },
        record.skipped ? "already stored" : "stored",
      );
      return;
    }
    this.log.warn({ ...fields, reasons: failureReasons(record) }, "identifier failed");
  }
}
