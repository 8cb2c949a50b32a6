import { Writable } from "node:stream";
import { pino } from "pino";
import { describe, expect, test } from "vitest";
import { renderRunReport } from "../report.js";
import { LoggingReporter, type OutcomeRecord, failureReasons } from "../reporter.js";
import type { RunReport } from "../run.js";

const base = { batch: "batch-a", run_id: "run-1", skipped: false };

const FETCH_FAILED: OutcomeRecord = {
  ...base,
  identifier: "D2",
  key: "d2",
  state: "FETCH_FAILED",
  fetch: {
    status: "FAILED",
    reason: "ROUTE_DENIED",
    attempts: [
      { route: "open-access", result: "ROUTE_DENIED", attempts: 1, detail: "HTTP 403" },
      { route: "manual", result: "NOT_FOUND", attempts: 1 },
    ],
  },
};

const PARSE_FAILED: OutcomeRecord = {
  ...base,
  identifier: "D3",
  key: "d3",
  state: "PARSE_FAILED",
  parse_failure: {
    code: "EMPTY_CONTENT",
    message: "no paragraphs extracted from html artifact",
  },
};

const STORED: OutcomeRecord = {
  ...base,
  identifier: "D1",
  key: "d1",
  state: "STORED",
  corpus: { key: "d1", version: 1, digest: "abc", changed: true },
  confidence: 0.82,
};

function report(failures: OutcomeRecord[]): RunReport {
  return {
    run_id: "run-1",
    batch: "batch-a",
    started_at: "2024-05-01T12:00:00.000Z",
    finished_at: "2024-05-01T12:01:00.000Z",
    counts: {
      total: 1 + failures.length,
      stored: 1,
      fetch_failed: failures.filter((r) => r.state === "FETCH_FAILED").length,
      parse_failed: failures.filter((r) => r.state === "PARSE_FAILED").length,
      skipped: 0,
      cancelled: 0,
      partial: 0,
    },
    failures,
    records: [STORED, ...failures],
  };
}

describe("failureReasons", () => {
  test("lists the fetch reason then each route attempt", () => {
    expect(failureReasons(FETCH_FAILED)).toEqual([
      "ROUTE_DENIED",
      "open-access: ROUTE_DENIED (1 attempt, HTTP 403)",
      "manual: NOT_FOUND (1 attempt)",
    ]);
  });

  test("parse failures give code and message", () => {
    expect(failureReasons(PARSE_FAILED)).toEqual([
      "EMPTY_CONTENT: no paragraphs extracted from html artifact",
    ]);
  });

  test("stored records have no reasons", () => {
    expect(failureReasons(STORED)).toEqual([]);
  });
});

describe("renderRunReport", () => {
  test("renders counts and failures grouped by state", () => {
    expect(renderRunReport(report([FETCH_FAILED, PARSE_FAILED]))).toBe(
      [
        "## Run run-1",
        "",
        "**Batch:** batch-a",
        "",
        "### Counts",
        "",
        "| Outcome | Count |",
        "| --- | --- |",
        "| Stored | 1 |",
        "| Fetch failed | 1 |",
        "| Parse failed | 1 |",
        "| Skipped (already stored) | 0 |",
        "| Cancelled | 0 |",
        "",
        "3 identifiers, 0 stored from partial artifacts.",
        "",
        "### Fetch failures",
        "- `D2` - ROUTE_DENIED",
        "  - open-access: ROUTE_DENIED (1 attempt, HTTP 403)",
        "  - manual: NOT_FOUND (1 attempt)",
        "",
        "### Parse failures",
        "- `D3` - EMPTY_CONTENT: no paragraphs extracted from html artifact",
      ].join("\n"),
    );
  });

  test("omits failure sections when nothing failed", () => {
    const rendered = renderRunReport(report([]));
    expect(rendered.endsWith("1 identifiers, 0 stored from partial artifacts.")).toBe(true);
  });
});

describe("LoggingReporter", () => {
  function capture() {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    return { lines, logger: pino({ level: "info" }, stream) };
  }

  const parsedLine = (line: string | undefined): unknown =>
    line === undefined ? undefined : JSON.parse(line);

  test("stored records log at info with the corpus version", () => {
    const { lines, logger } = capture();
    new LoggingReporter(logger).report(STORED);

    expect(lines).toHaveLength(1);
    expect(parsedLine(lines[0])).toMatchObject({
      level: 30,
      component: "outcomes",
      identifier: "d1",
      state: "STORED",
      version: 1,
      changed: true,
      confidence: 0.82,
      msg: "stored",
    });
  });

  test("failures log at warn with their reasons", () => {
    const { lines, logger } = capture();
    new LoggingReporter(logger).report(PARSE_FAILED);

    expect(parsedLine(lines[0])).toMatchObject({
      level: 40,
      identifier: "d3",
      state: "PARSE_FAILED",
      reasons: ["EMPTY_CONTENT: no paragraphs extracted from html artifact"],
      msg: "identifier failed",
    });
  });
});
