import { type Logger, componentLogger } from "../logger.js";
import { PipelineError } from "../pipeline/errors.js";
import { normalizeIdentifier } from "../queue/index.js";
import type {
  AccessRoute,
  ArtifactRef,
  DetectedFormat,
  FetchOutcome,
  RouteAttempt,
  RouteFailureReason,
  SoftSuccessReason,
} from "../schemas/index.js";
import { ScratchError, type ScratchStore } from "../scratch/index.js";
import {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  calculateBackoff,
  sleep,
  withTimeout,
} from "./backoff.js";
import { RateLimitTimeoutError } from "./errors.js";
import { detectFormat, isTruncated } from "./format.js";
import { RateLimiterRegistry, type ReleaseSlot } from "./rate-limiter.js";
import type { Retrieval, RouteClient } from "./route-client.js";
import { SingleFlight } from "./single-flight.js";

export const DEFAULT_ATTEMPT_TIMEOUT_MS = 100_000;
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 60_000;

export interface FetchOrchestratorOptions {
  client: RouteClient;
  scratch: ScratchStore;
  limiters?: RateLimiterRegistry;
  retry?: RetryPolicy;
  attemptTimeoutMs?: number;
  acquireTimeoutMs?: number;
  scratchTtlSeconds?: number;
  logger?: Logger;
  random?: () => number; // backoff jitter source, fixed in tests
}

interface RetrievedArtifact {
  bytes: Uint8Array;
  content_type?: string;
  format: DetectedFormat;
}

type RouteResult =
  | ({ kind: "success" } & RetrievedArtifact)
  | ({ kind: "soft"; reason: SoftSuccessReason } & RetrievedArtifact)
  | { kind: "failed"; reason: RouteFailureReason; detail: string };

interface PartialCandidate extends RetrievedArtifact {
  route: AccessRoute;
  reason: SoftSuccessReason;
  attempt: RouteAttempt;
}

type Persisted = { ok: true; ref: ArtifactRef } | { ok: false; detail: string };

const SOFT_RANK: Record<SoftSuccessReason, number> = {
  FORMAT_MISMATCH: 0, // content complete, just not what the route promised
  ARTIFACT_TRUNCATED: 1,
};

/** Earlier candidates win ties, so `challenger` must be strictly better. */
function isBetterPartial(
  challenger: PartialCandidate,
  current: PartialCandidate,
): boolean {
  const rank = SOFT_RANK[challenger.reason] - SOFT_RANK[current.reason];
  if (rank !== 0) return rank < 0;
  return challenger.bytes.byteLength > current.bytes.byteLength;
}

/** Best first; stable, so equal candidates keep route order. */
function rankPartials(candidates: readonly PartialCandidate[]): PartialCandidate[] {
  return [...candidates].sort((a, b) => {
    if (isBetterPartial(a, b)) return -1;
    return isBetterPartial(b, a) ? 1 : 0;
  });
}

function failureReason(attempts: RouteAttempt[]): RouteFailureReason {
  const results = new Set(attempts.map((a) => a.result));
  if (results.has("ROUTE_UNAVAILABLE")) return "ROUTE_UNAVAILABLE";
  if (results.has("ROUTE_DENIED")) return "ROUTE_DENIED";
  if (results.has("ARTIFACT_TOO_LARGE")) return "ARTIFACT_TOO_LARGE";
  return "NOT_FOUND";
}

/**
 * Tries each route in order until one yields the expected artifact.
 * Retries transient failures with backoff, respects per-class rate
 * limits, and persists the chosen artifact to scratch before returning.
 * An artifact scratch refuses as too large counts as a failed route.
 */
export class FetchOrchestrator {
  private readonly client: RouteClient;
  private readonly scratch: ScratchStore;
  private readonly limiters: RateLimiterRegistry;
  private readonly retry: RetryPolicy;
  private readonly attemptTimeoutMs: number;
  private readonly acquireTimeoutMs: number;
  private readonly scratchTtlSeconds?: number;
  private readonly log: Logger;
  private readonly random: () => number;
  private readonly flights = new SingleFlight<FetchOutcome>();

  constructor(opts: FetchOrchestratorOptions) {
    this.client = opts.client;
    this.scratch = opts.scratch;
    this.limiters = opts.limiters ?? new RateLimiterRegistry();
    this.retry = opts.retry ?? DEFAULT_RETRY_POLICY;
    this.attemptTimeoutMs = opts.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
    this.acquireTimeoutMs = opts.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.scratchTtlSeconds = opts.scratchTtlSeconds;
    this.log = componentLogger("fetch", opts.logger);
    this.random = opts.random ?? Math.random;
  }

  /**
   * Concurrent calls for the same identifier share one fetch, so there is
   * only ever one writer of its scratch artifact.
   */
  fetch(
    identifier: string,
    routes: readonly AccessRoute[],
    signal?: AbortSignal,
  ): Promise<FetchOutcome> {
    const key = normalizeIdentifier(identifier);
    return this.flights.run(key, () =>
      this.fetchRoutes(key, identifier, routes, signal),
    );
  }

  private async fetchRoutes(
    key: string,
    identifier: string,
    routes: readonly AccessRoute[],
    signal: AbortSignal | undefined,
  ): Promise<FetchOutcome> {
    const log = this.log.child({ identifier: key });
    const attempts: RouteAttempt[] = [];
    const partials: PartialCandidate[] = [];

    for (const route of routes) {
      this.throwIfCancelled(key, signal);
      const { result, count } = await this.tryRoute(key, route, signal, log);

      if (result.kind === "success") {
        const persisted = await this.persist(key, identifier, result);
        if (!persisted.ok) {
          attempts.push({
            route: route.name,
            result: "ARTIFACT_TOO_LARGE",
            attempts: count,
            detail: persisted.detail,
          });
          log.warn({ route: route.name, detail: persisted.detail }, "artifact rejected");
          continue;
        }
        attempts.push({ route: route.name, result: "SUCCESS", attempts: count });
        log.info(
          { route: route.name, format: result.format, size: persisted.ref.size },
          "artifact fetched",
        );
        return {
          status: "SUCCESS",
          artifact: persisted.ref,
          format: result.format,
          route: route.name,
          attempts,
        };
      }

      if (result.kind === "soft") {
        const attempt: RouteAttempt = {
          route: route.name,
          result: result.reason,
          attempts: count,
          detail: `${result.format}, ${result.bytes.byteLength} bytes`,
        };
        attempts.push(attempt);
        partials.push({ ...result, route, attempt });
        continue;
      }

      attempts.push({
        route: route.name,
        result: result.reason,
        attempts: count,
        detail: result.detail,
      });
      log.debug({ route: route.name, reason: result.reason }, "route failed");
    }

    for (const best of rankPartials(partials)) {
      const persisted = await this.persist(key, identifier, best);
      if (!persisted.ok) {
        best.attempt.result = "ARTIFACT_TOO_LARGE";
        best.attempt.detail = persisted.detail;
        continue;
      }
      log.warn(
        { route: best.route.name, reason: best.reason },
        "keeping partial artifact",
      );
      return {
        status: "PARTIAL",
        artifact: persisted.ref,
        format: best.format,
        route: best.route.name,
        reason: best.reason,
        attempts,
      };
    }

    const reason = failureReason(attempts);
    log.warn({ reason, routes: attempts.length }, "all routes failed");
    return { status: "FAILED", reason, attempts };
  }

  private async tryRoute(
    key: string,
    route: AccessRoute,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<{ result: RouteResult; count: number }> {
    let lastDetail = "no attempt made";
    for (let attempt = 0; attempt < this.retry.max_attempts; attempt++) {
      if (attempt > 0) {
        await sleep(
          calculateBackoff(attempt - 1, this.retry.backoff, this.random),
          signal,
        );
      }
      this.throwIfCancelled(key, signal);

      const retrieval = await this.attempt(key, route);
      const count = attempt + 1;
      switch (retrieval.kind) {
        case "artifact":
          return { result: this.classify(route, retrieval), count };
        case "denied":
          return {
            result: { kind: "failed", reason: "ROUTE_DENIED", detail: retrieval.detail },
            count,
          };
        case "not_found":
          return {
            result: { kind: "failed", reason: "NOT_FOUND", detail: retrieval.detail },
            count,
          };
        case "unavailable":
          lastDetail = retrieval.detail;
          log.debug(
            { route: route.name, attempt: count, detail: retrieval.detail },
            "route unavailable",
          );
          break;
      }
    }
    return {
      result: { kind: "failed", reason: "ROUTE_UNAVAILABLE", detail: lastDetail },
      count: this.retry.max_attempts,
    };
  }

  /** One rate-limited, time-boxed call. Never rejects for transport reasons. */
  private async attempt(key: string, route: AccessRoute): Promise<Retrieval> {
    let release: ReleaseSlot;
    try {
      release = await this.limiters
        .get(route.rate_limit_class)
        .acquire(this.acquireTimeoutMs);
    } catch (err) {
      if (err instanceof RateLimitTimeoutError) {
        return { kind: "unavailable", detail: err.message };
      }
      throw err;
    }

    const controller = new AbortController();
    const timeoutMs = route.timeout_ms ?? this.attemptTimeoutMs;
    try {
      const pending = this.client
        .retrieve(key, route, controller.signal)
        .catch(
          (err: unknown): Retrieval => ({
            kind: "unavailable",
            detail: err instanceof Error ? err.message : String(err),
          }),
        );
      const raced = await withTimeout(pending, timeoutMs);
      if (raced.type === "timeout") {
        controller.abort();
        return { kind: "unavailable", detail: `timed out after ${timeoutMs}ms` };
      }
      return raced.value;
    } finally {
      release();
    }
  }

  private classify(
    route: AccessRoute,
    retrieval: Extract<Retrieval, { kind: "artifact" }>,
  ): RouteResult {
    const format = detectFormat(retrieval.bytes, retrieval.content_type);
    const artifact: RetrievedArtifact = {
      bytes: retrieval.bytes,
      content_type: retrieval.content_type,
      format,
    };
    if (isTruncated(retrieval.bytes, format, retrieval.declared_length)) {
      return { kind: "soft", reason: "ARTIFACT_TRUNCATED", ...artifact };
    }
    // Hand-placed files are taken in whatever known format they arrive in.
    const accepted =
      format === route.expected_format ||
      (route.kind === "manual" && format !== "unknown");
    if (accepted) return { kind: "success", ...artifact };
    return { kind: "soft", reason: "FORMAT_MISMATCH", ...artifact };
  }

  private async persist(
    key: string,
    identifier: string,
    artifact: RetrievedArtifact,
  ): Promise<Persisted> {
    try {
      const ref = await this.scratch.put({
        key,
        identifier,
        format: artifact.format,
        bytes: artifact.bytes,
        content_type: artifact.content_type,
        ttl_seconds: this.scratchTtlSeconds,
      });
      return { ok: true, ref };
    } catch (err) {
      if (err instanceof ScratchError && err.code === "DATA_TOO_LARGE") {
        return { ok: false, detail: err.message };
      }
      throw err;
    }
  }

  private throwIfCancelled(key: string, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new PipelineError("CANCELLED", `fetch of ${key} cancelled`, {
        identifier: key,
      });
    }
  }
}
