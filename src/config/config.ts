import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  DEFAULT_ACQUIRE_TIMEOUT_MS,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RETRY_POLICY,
  RateLimitSettingsSchema,
  RetryPolicySchema,
} from "../fetch/index.js";
import { AccessRouteSchema } from "../schemas/index.js";
import { ConfigError } from "./errors.js";

const ENV_PREFIX = "INGEST_";
const CREDENTIAL_PREFIX = "INGEST_CREDENTIAL_";

export const IngestConfigSchema = z
  .object({
    batch: z.string().min(1),
    concurrency: z.number().int().min(1),
    retry: RetryPolicySchema,
    attempt_timeout_ms: z.number().int().positive(),
    acquire_timeout_ms: z.number().int().positive(),
    default_rate_limit: RateLimitSettingsSchema,
    rate_limits: z.record(z.string(), RateLimitSettingsSchema), // by route class
    routes: z.record(z.string(), z.array(AccessRouteSchema).min(1)).optional(),
    proxy_prefix: z.string().url().optional(),
    credentials: z.record(z.string(), z.string()),
    manual_dir: z.string().min(1).optional(),
    db_path: z.string().min(1),
    scratch_ttl_seconds: z.number().int().positive().optional(),
    scratch_max_bytes: z.number().int().positive().optional(),
    retain_artifacts: z.boolean(),
  })
  .strict();

export type IngestConfig = z.infer<typeof IngestConfigSchema>;

export const DEFAULT_CONFIG: IngestConfig = {
  batch: "default",
  concurrency: 4,
  retry: DEFAULT_RETRY_POLICY,
  attempt_timeout_ms: DEFAULT_ATTEMPT_TIMEOUT_MS,
  acquire_timeout_ms: DEFAULT_ACQUIRE_TIMEOUT_MS,
  default_rate_limit: { ...DEFAULT_RATE_LIMIT },
  rate_limits: {
    doi: { max_concurrent: 2, min_interval_ms: 500 },
    local: { max_concurrent: 8, min_interval_ms: 0 },
  },
  credentials: {},
  db_path: "corpus.db",
  retain_artifacts: false,
};

type Layer = Record<string, unknown>;

function isRecord(value: unknown): value is Layer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested objects merge key by key; arrays and scalars replace. */
export function mergeLayers(base: Layer, overlay: Layer): Layer {
  const merged: Layer = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
  }
  return merged;
}

/** Numeric strings become numbers; anything else is left for the schema to reject. */
function numeric(value: string | undefined): unknown {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

function boolean(value: string | undefined): unknown {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return value;
}

function text(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * INGEST_* variables as a config layer. INGEST_CREDENTIAL_ELSEVIER becomes
 * credential "elsevier", referenced in route headers as {credential:elsevier}.
 */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
  const credentials: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (name.startsWith(CREDENTIAL_PREFIX) && value) {
      credentials[name.slice(CREDENTIAL_PREFIX.length).toLowerCase()] = value;
    }
  }

  const v = (name: string) => env[`${ENV_PREFIX}${name}`];
  return {
    batch: text(v("BATCH")),
    concurrency: numeric(v("CONCURRENCY")),
    retry: {
      max_attempts: numeric(v("MAX_ATTEMPTS")),
      backoff: {
        base_ms: numeric(v("BACKOFF_BASE_MS")),
        max_ms: numeric(v("BACKOFF_MAX_MS")),
      },
    },
    attempt_timeout_ms: numeric(v("ATTEMPT_TIMEOUT_MS")),
    acquire_timeout_ms: numeric(v("ACQUIRE_TIMEOUT_MS")),
    proxy_prefix: text(v("PROXY_PREFIX")),
    credentials,
    manual_dir: text(v("MANUAL_DIR")),
    db_path: text(v("DB_PATH")),
    scratch_ttl_seconds: numeric(v("SCRATCH_TTL_SECONDS")),
    scratch_max_bytes: numeric(v("SCRATCH_MAX_BYTES")),
    retain_artifacts: boolean(v("RETAIN_ARTIFACTS")),
  };
}

function fileLayer(path: string): Layer {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("CONFIG_FILE_UNREADABLE", `Cannot read config file ${path}: ${reason}`);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(
      "CONFIG_FILE_UNREADABLE",
      `Config file ${path} must contain a JSON object`,
    );
  }
  return raw;
}

/**
 * Resolve run parameters. Precedence, lowest first: built-in defaults,
 * the JSON file named by INGEST_CONFIG_FILE, INGEST_* variables, overrides.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Layer = {},
): IngestConfig {
  let merged: Layer = { ...DEFAULT_CONFIG };
  const file = text(env.INGEST_CONFIG_FILE);
  if (file) merged = mergeLayers(merged, fileLayer(file));
  merged = mergeLayers(merged, envLayer(env));
  merged = mergeLayers(merged, overrides);

  const parsed = IngestConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
