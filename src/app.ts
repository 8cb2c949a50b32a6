import type { AxiosInstance } from "axios";
import type { IngestConfig } from "./config/index.js";
import { SqliteCorpusStore } from "./corpus/index.js";
import {
  FetchOrchestrator,
  HttpRouteClient,
  ManualRouteClient,
  RateLimiterRegistry,
  RoutingClient,
  createHttpClient,
} from "./fetch/index.js";
import type { Logger } from "./logger.js";
import { DocumentParser } from "./parser/index.js";
import { type SqliteDatabase, openDatabase } from "./persistence/index.js";
import {
  LoggingReporter,
  type RunIngestionOptions,
  SqliteOutcomeLedger,
} from "./pipeline/index.js";
import {
  SourceResolver,
  defaultRouteTable,
  mergeRouteTables,
} from "./resolver/index.js";
import { SqliteScratchStore } from "./scratch/index.js";

export interface Pipeline {
  db: SqliteDatabase;
  scratch: SqliteScratchStore;
  ledger: SqliteOutcomeLedger;
  corpus: SqliteCorpusStore;
  /** Everything runIngestion needs except the queue and the signal. */
  components: Omit<RunIngestionOptions, "queue" | "signal">;
  close(): void;
}

export interface CreatePipelineOptions {
  http?: AxiosInstance; // tests pass an instance with an in-process adapter
  logger?: Logger;
}

/**
 * Wire stores, clients and stages from config. Scratch, ledger and corpus
 * share one SQLite database, closed by `close()`.
 */
export function createPipeline(
  config: IngestConfig,
  opts: CreatePipelineOptions = {},
): Pipeline {
  const db = openDatabase(config.db_path);
  const scratch = new SqliteScratchStore({
    db,
    defaultTtlSeconds: config.scratch_ttl_seconds,
    maxBytes: config.scratch_max_bytes,
  });
  const ledger = new SqliteOutcomeLedger({ db });
  const corpus = new SqliteCorpusStore({ db });

  const client = new RoutingClient(
    new HttpRouteClient({
      client: opts.http ?? createHttpClient(),
      credentials: config.credentials,
      defaultTimeoutMs: config.attempt_timeout_ms,
    }),
    new ManualRouteClient(config.manual_dir),
  );

  const resolver = new SourceResolver(
    mergeRouteTables(defaultRouteTable({ proxyPrefix: config.proxy_prefix }), config.routes),
  );

  const orchestrator = new FetchOrchestrator({
    client,
    scratch,
    limiters: new RateLimiterRegistry(config.rate_limits, config.default_rate_limit),
    retry: config.retry,
    attemptTimeoutMs: config.attempt_timeout_ms,
    acquireTimeoutMs: config.acquire_timeout_ms,
    scratchTtlSeconds: config.scratch_ttl_seconds,
    logger: opts.logger,
  });

  return {
    db,
    scratch,
    ledger,
    corpus,
    components: {
      resolver,
      orchestrator,
      parser: new DocumentParser({ scratch, logger: opts.logger }),
      corpus,
      ledger,
      scratch,
      concurrency: config.concurrency,
      batch: config.batch,
      retainArtifacts: config.retain_artifacts,
      reporter: new LoggingReporter(opts.logger),
      logger: opts.logger,
    },
    close: () => db.close(),
  };
}
