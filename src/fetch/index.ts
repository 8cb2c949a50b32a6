export {
  type BackoffConfig,
  BackoffConfigSchema,
  DEFAULT_BACKOFF,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  RetryPolicySchema,
  type TimeoutResult,
  calculateBackoff,
  sleep,
  withTimeout,
} from "./backoff.js";
export { RateLimitTimeoutError } from "./errors.js";
export { detectFormat, isTruncated } from "./format.js";
export {
  DEFAULT_HTTP_TIMEOUT_MS,
  HttpRouteClient,
  type HttpRouteClientOptions,
  classifyStatus,
  createHttpClient,
  expandTemplate,
} from "./http-client.js";
export { ManualRouteClient } from "./manual-client.js";
export {
  DEFAULT_ACQUIRE_TIMEOUT_MS,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  FetchOrchestrator,
  type FetchOrchestratorOptions,
} from "./orchestrator.js";
export {
  DEFAULT_RATE_LIMIT,
  RateLimiter,
  RateLimiterRegistry,
  type RateLimitSettings,
  RateLimitSettingsSchema,
  type ReleaseSlot,
} from "./rate-limiter.js";
export { type Retrieval, type RouteClient, RoutingClient } from "./route-client.js";
export { Semaphore } from "./semaphore.js";
export { SingleFlight } from "./single-flight.js";
