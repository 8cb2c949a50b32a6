import { failureReasons } from "./reporter.js";
import type { RunReport } from "./run.js";

/**
 * Renders a RunReport as markdown for the operator.
 *
 * Failures are grouped by state so the failed subset can be re-run.
 */
export function renderRunReport(report: RunReport): string {
  const sections: string[] = [];

  sections.push(`## Run ${report.run_id}\n\n**Batch:** ${report.batch}`);
  sections.push(renderCounts(report.counts));

  const fetchFailed = report.failures.filter((r) => r.state === "FETCH_FAILED");
  if (fetchFailed.length > 0) {
    sections.push(renderFailures("Fetch failures", fetchFailed));
  }

  const parseFailed = report.failures.filter((r) => r.state === "PARSE_FAILED");
  if (parseFailed.length > 0) {
    sections.push(renderFailures("Parse failures", parseFailed));
  }

  return sections.join("\n\n");
}

function renderCounts(counts: RunReport["counts"]): string {
  const rows: Array<[string, number]> = [
    ["Stored", counts.stored],
    ["Fetch failed", counts.fetch_failed],
    ["Parse failed", counts.parse_failed],
    ["Skipped (already stored)", counts.skipped],
    ["Cancelled", counts.cancelled],
  ];
  const lines = ["### Counts", "", "| Outcome | Count |", "| --- | --- |"];
  for (const [label, value] of rows) {
    lines.push(`| ${label} | ${value} |`);
  }
  lines.push("", `${counts.total} identifiers, ${counts.partial} stored from partial artifacts.`);
  return lines.join("\n");
}

function renderFailures(title: string, records: RunReport["failures"]): string {
  const parts: string[] = [`### ${title}`];
  for (const record of records) {
    const [first, ...rest] = failureReasons(record);
    parts.push(`- \`${record.identifier}\` - ${first ?? "unknown"}`);
    for (const reason of rest) {
      parts.push(`  - ${reason}`);
    }
  }
  return parts.join("\n");
}
