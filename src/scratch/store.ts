import type { ArtifactRef, DetectedFormat } from "../schemas/index.js";

export interface ScratchPut {
  key: string; // normalized identifier
  identifier: string;
  format: DetectedFormat;
  bytes: Uint8Array;
  content_type?: string;
  ttl_seconds?: number;
}

export interface ScratchEntry {
  key: string;
  identifier: string;
  format: DetectedFormat;
  bytes: Uint8Array;
  content_type?: string;
  digest: string;
  size: number;
  created_at: number;
  expires_at?: number;
}

/**
 * Temporary home for fetched artifacts between fetch and parse.
 * Implementations: SqliteScratchStore (production and tests).
 */
export interface ScratchStore {
  /** Overwrites any entry under the same key; returns the stored ref. */
  put(entry: ScratchPut): Promise<ArtifactRef>;

  /** Null when absent or expired. */
  get(key: string): Promise<ScratchEntry | null>;

  /** True only if the entry exists and still has the ref's digest. */
  has(ref: ArtifactRef): Promise<boolean>;

  delete(key: string): Promise<void>;

  /** Remove expired entries; returns how many were removed. */
  purgeExpired(): Promise<number>;
}
