import { ulid } from "ulid";
import type { CorpusWriter } from "../corpus/index.js";
import { Semaphore } from "../fetch/index.js";
import { type Logger, componentLogger } from "../logger.js";
import type { ParseResult } from "../parser/index.js";
import { normalizeIdentifier } from "../queue/index.js";
import type {
  AccessRoute,
  ArtifactRef,
  DetectedFormat,
  FetchOutcome,
  LedgerEntry,
  WorkIdentifier,
} from "../schemas/index.js";
import type { ScratchStore } from "../scratch/index.js";
import { PipelineError } from "./errors.js";
import type { OutcomeLedger } from "./ledger.js";
import { type OutcomeRecord, type OutcomeReporter, LoggingReporter } from "./reporter.js";
import { resumePoint } from "./states.js";

export const DEFAULT_CONCURRENCY = 4;

export interface RouteResolver {
  resolve(identifier: string): AccessRoute[];
}

export interface ArtifactFetcher {
  fetch(
    identifier: string,
    routes: readonly AccessRoute[],
    signal?: AbortSignal,
  ): Promise<FetchOutcome>;
}

export interface ArtifactParser {
  parse(ref: ArtifactRef, format: DetectedFormat): Promise<ParseResult>;
}

export interface RunIngestionOptions {
  queue: Iterable<WorkIdentifier>;
  resolver: RouteResolver;
  orchestrator: ArtifactFetcher;
  parser: ArtifactParser;
  corpus: CorpusWriter;
  ledger: OutcomeLedger;
  scratch: ScratchStore;
  concurrency?: number; // default 4
  signal?: AbortSignal;
  reporter?: OutcomeReporter;
  run_id?: string;
  batch?: string; // label for the report; defaults to the first item's batch
  retainArtifacts?: boolean; // keep scratch entries after storing
  logger?: Logger;
}

export interface RunCounts {
  total: number;
  stored: number;
  fetch_failed: number;
  parse_failed: number;
  skipped: number;
  cancelled: number;
  partial: number; // stored from a PARTIAL fetch outcome
}

export interface RunReport {
  run_id: string;
  batch: string;
  started_at: string;
  finished_at: string;
  counts: RunCounts;
  failures: OutcomeRecord[];
  records: OutcomeRecord[]; // queue order; cancelled identifiers absent
}

type Artifact = { ref: ArtifactRef; format: DetectedFormat; outcome: FetchOutcome };

function artifactOf(outcome: FetchOutcome | undefined): Artifact | undefined {
  if (!outcome || outcome.status === "FAILED") return undefined;
  return { ref: outcome.artifact, format: outcome.format, outcome };
}

/** First entry per normalized identifier, in queue order. */
function distinctByKey(queued: readonly WorkIdentifier[]): WorkIdentifier[] {
  const seen = new Set<string>();
  return queued.filter((item) => {
    const key = normalizeIdentifier(item.identifier);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function isCancellation(err: unknown): boolean {
  return err instanceof PipelineError && err.code === "CANCELLED";
}

/**
 * Drive every queued identifier through fetch, parse and store with a
 * bounded worker pool. An identifier queued more than once is processed
 * once; the ledger keeps every batch it arrived in.
 *
 * Per-identifier failures become FETCH_FAILED or PARSE_FAILED records.
 * Anything thrown (PersistenceError above all) is systemic: no new
 * identifiers start, in-flight ones finish, then the first error is
 * rethrown. Cancelling the signal also stops new work; identifiers that
 * never started stay QUEUED in the ledger.
 */
export async function runIngestion(opts: RunIngestionOptions): Promise<RunReport> {
  const queued = [...opts.queue];
  const items = distinctByKey(queued);
  const run_id = opts.run_id ?? ulid();
  const batch = opts.batch ?? items[0]?.batch ?? "default";
  const log = componentLogger("pipeline", opts.logger).child({ run_id });
  const reporter = opts.reporter ?? new LoggingReporter(opts.logger);
  const started_at = new Date().toISOString();

  // Stop issuing work on either external cancellation or a fatal error
  const stop = new AbortController();
  const onAbort = () => stop.abort();
  if (opts.signal?.aborted) stop.abort();
  opts.signal?.addEventListener("abort", onAbort, { once: true });

  const ctx: ItemContext = { ...opts, run_id, signal: stop.signal };
  const pool = new Semaphore(opts.concurrency ?? DEFAULT_CONCURRENCY);
  const slots = new Array<OutcomeRecord | undefined>(items.length);
  const fatal: unknown[] = [];

  log.info({ batch, identifiers: items.length }, "run started");

  try {
    for (const item of queued) {
      await opts.ledger.register(item, run_id);
    }

    await Promise.all(
      items.map(async (item, index) => {
        await pool.acquire();
        try {
          if (stop.signal.aborted) return;
          const record = await processItem(item, ctx);
          if (record) {
            slots[index] = record;
            await reporter.report(record);
          }
        } catch (err) {
          if (fatal.length === 0) {
            log.error({ identifier: normalizeIdentifier(item.identifier), err }, "run aborted");
          }
          fatal.push(err);
          stop.abort();
        } finally {
          pool.release();
        }
      }),
    );
  } finally {
    opts.signal?.removeEventListener("abort", onAbort);
  }

  if (fatal.length > 0) throw fatal[0];

  const records = slots.filter((r): r is OutcomeRecord => r !== undefined);
  const counts: RunCounts = {
    total: items.length,
    stored: records.filter((r) => r.state === "STORED" && !r.skipped).length,
    fetch_failed: records.filter((r) => r.state === "FETCH_FAILED").length,
    parse_failed: records.filter((r) => r.state === "PARSE_FAILED").length,
    skipped: records.filter((r) => r.skipped).length,
    cancelled: items.length - records.length,
    partial: records.filter((r) => !r.skipped && r.fetch?.status === "PARTIAL").length,
  };
  log.info({ counts }, opts.signal?.aborted ? "run cancelled" : "run finished");

  return {
    run_id,
    batch,
    started_at,
    finished_at: new Date().toISOString(),
    counts,
    failures: records.filter((r) => r.state !== "STORED"),
    records,
  };
}

interface ItemContext extends RunIngestionOptions {
  run_id: string;
  signal: AbortSignal;
}

/** Returns undefined when the run was cancelled before this item finished fetching. */
async function processItem(
  item: WorkIdentifier,
  ctx: ItemContext,
): Promise<OutcomeRecord | undefined> {
  const { ledger, run_id } = ctx;
  const key = normalizeIdentifier(item.identifier);
  const base = { identifier: item.identifier, key, batch: item.batch, run_id };

  const entry = await ledger.get(key);
  if (!entry) {
    throw new PipelineError("INVALID_TRANSITION", `${key} is not in the ledger`, { key });
  }

  let artifact: Artifact | undefined;
  switch (resumePoint(entry.state)) {
    case "skip":
      return { ...base, state: "STORED", skipped: true, fetch: entry.fetch_outcome };
    case "parse":
      artifact = await rewindForParse(entry, ctx);
      break;
    case "fetch":
      await rewindToQueued(entry, ctx);
      break;
  }

  if (!artifact) {
    if (ctx.signal.aborted) return undefined;
    const outcome = await fetchStage(item, ctx);
    if (!outcome) return undefined;
    if (outcome.status === "FAILED") {
      return { ...base, state: "FETCH_FAILED", skipped: false, fetch: outcome };
    }
    artifact = artifactOf(outcome);
  }
  if (!artifact) {
    throw new PipelineError("INVALID_TRANSITION", `${key} fetched without an artifact`, { key });
  }

  return parseStage(base, artifact, ctx);
}

/**
 * FETCHED, PARSING and PARSED re-enter at parsing when their artifact is
 * still in scratch; otherwise they go back to the queue.
 */
async function rewindForParse(
  entry: LedgerEntry,
  ctx: ItemContext,
): Promise<Artifact | undefined> {
  const artifact = artifactOf(entry.fetch_outcome);
  const available = artifact ? await ctx.scratch.has(artifact.ref) : false;

  if (entry.state !== "FETCHED") {
    await ctx.ledger.transition(entry.key, "FETCHED", ctx.run_id);
  }
  if (available) return artifact;
  await ctx.ledger.transition(entry.key, "QUEUED", ctx.run_id);
  return undefined;
}

async function rewindToQueued(entry: LedgerEntry, ctx: ItemContext): Promise<void> {
  if (entry.state !== "QUEUED") {
    await ctx.ledger.transition(entry.key, "QUEUED", ctx.run_id);
  }
}

async function fetchStage(
  item: WorkIdentifier,
  ctx: ItemContext,
): Promise<FetchOutcome | undefined> {
  const { ledger, run_id } = ctx;
  await ledger.transition(item.identifier, "FETCHING", run_id);

  let outcome: FetchOutcome;
  try {
    outcome = await ctx.orchestrator.fetch(
      item.identifier,
      ctx.resolver.resolve(item.identifier),
      ctx.signal,
    );
  } catch (err) {
    if (!isCancellation(err)) throw err;
    await ledger.transition(item.identifier, "QUEUED", run_id);
    return undefined;
  }

  await ledger.transition(
    item.identifier,
    outcome.status === "FAILED" ? "FETCH_FAILED" : "FETCHED",
    run_id,
    { fetch_outcome: outcome },
  );
  return outcome;
}

async function parseStage(
  base: Pick<OutcomeRecord, "identifier" | "key" | "batch" | "run_id">,
  artifact: Artifact,
  ctx: ItemContext,
): Promise<OutcomeRecord> {
  const { ledger, run_id } = ctx;
  await ledger.transition(base.key, "PARSING", run_id);

  const result = await ctx.parser.parse(artifact.ref, artifact.format);
  if (result.status === "failed") {
    await ledger.transition(base.key, "PARSE_FAILED", run_id, {
      parse_failure: result.failure,
    });
    return {
      ...base,
      state: "PARSE_FAILED",
      skipped: false,
      fetch: artifact.outcome,
      parse_failure: result.failure,
    };
  }

  await ledger.transition(base.key, "PARSED", run_id, { parse_failure: null });
  const corpus = await ctx.corpus.upsert(base.identifier, result.document);
  await ledger.transition(base.key, "STORED", run_id);

  if (!ctx.retainArtifacts) await ctx.scratch.delete(base.key);

  return {
    ...base,
    state: "STORED",
    skipped: false,
    fetch: artifact.outcome,
    corpus,
    confidence: result.document.metadata.confidence,
  };
}
