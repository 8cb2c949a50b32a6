import type { Statement } from "better-sqlite3";
import { z } from "zod";
import {
  type DatabaseSource,
  type SqliteDatabase,
  PersistenceError,
  guard,
  resolveDatabase,
  sha256Hex,
} from "../persistence/index.js";
import {
  type ArtifactRef,
  DetectedFormatSchema,
} from "../schemas/index.js";
import { ScratchError } from "./errors.js";
import type { ScratchEntry, ScratchPut, ScratchStore } from "./store.js";

const EXPIRED_PURGE_INTERVAL_MS = 5 * 60 * 1000;
const EXPIRED_PURGE_BATCH_LIMIT = 100;

const ScratchRowSchema = z.object({
  key: z.string(),
  identifier: z.string(),
  format: DetectedFormatSchema,
  bytes: z.instanceof(Uint8Array),
  content_type: z.string().nullable(),
  digest: z.string(),
  size: z.number().int(),
  created_at: z.number().int(),
  expires_at: z.number().int().nullable(),
});

const RefRowSchema = z.object({ digest: z.string() });

export type SqliteScratchStoreOptions = DatabaseSource & {
  defaultTtlSeconds?: number; // unset: entries never expire
  maxBytes?: number;
  now?: () => number;
};

export class SqliteScratchStore implements ScratchStore {
  private readonly db: SqliteDatabase;
  private readonly owned: boolean;
  private readonly now: () => number;
  private readonly defaultTtlSeconds?: number;
  private readonly maxBytes?: number;
  private lastExpiredPurgeAtMs: number | null = null;
  private readonly stmts: {
    upsert: Statement;
    fetch: Statement;
    fetchDigest: Statement;
    remove: Statement;
    purgeExpired: Statement;
    purgeExpiredBatch: Statement;
  };

  constructor(opts: SqliteScratchStoreOptions) {
    const { db, owned } = resolveDatabase(opts);
    this.db = db;
    this.owned = owned;
    this.now = opts.now ?? Date.now;
    this.defaultTtlSeconds = opts.defaultTtlSeconds;
    this.maxBytes = opts.maxBytes;
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    if (this.owned) this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS scratch_artifacts (
        key           TEXT PRIMARY KEY,
        identifier    TEXT NOT NULL,
        format        TEXT NOT NULL,
        bytes         BLOB NOT NULL,
        content_type  TEXT,
        digest        TEXT NOT NULL,
        size          INTEGER NOT NULL,
        created_at    INTEGER NOT NULL,
        expires_at    INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_scratch_expires ON scratch_artifacts(expires_at)
        WHERE expires_at IS NOT NULL;
    `);
  }

  private prepareStatements() {
    return {
      upsert: this.db.prepare(`
        INSERT INTO scratch_artifacts (
          key, identifier, format, bytes, content_type, digest, size, created_at, expires_at
        ) VALUES (
          @key, @identifier, @format, @bytes, @content_type, @digest, @size, @created_at, @expires_at
        )
        ON CONFLICT(key) DO UPDATE SET
          identifier = excluded.identifier,
          format = excluded.format,
          bytes = excluded.bytes,
          content_type = excluded.content_type,
          digest = excluded.digest,
          size = excluded.size,
          created_at = excluded.created_at,
          expires_at = excluded.expires_at
      `),
      fetch: this.db.prepare(`
        SELECT * FROM scratch_artifacts
        WHERE key = ? AND (expires_at IS NULL OR expires_at > ?)
      `),
      fetchDigest: this.db.prepare(`
        SELECT digest FROM scratch_artifacts
        WHERE key = ? AND (expires_at IS NULL OR expires_at > ?)
      `),
      remove: this.db.prepare(`DELETE FROM scratch_artifacts WHERE key = ?`),
      purgeExpired: this.db.prepare(`
        DELETE FROM scratch_artifacts WHERE expires_at IS NOT NULL AND expires_at <= ?
      `),
      purgeExpiredBatch: this.db.prepare(`
        DELETE FROM scratch_artifacts WHERE key IN (
          SELECT key FROM scratch_artifacts
          WHERE expires_at IS NOT NULL AND expires_at <= @now
          LIMIT @limit
        )
      `),
    };
  }

  private maybePurgeExpired(now: number): void {
    if (
      this.lastExpiredPurgeAtMs !== null &&
      now - this.lastExpiredPurgeAtMs < EXPIRED_PURGE_INTERVAL_MS
    ) {
      return;
    }
    this.stmts.purgeExpiredBatch.run({
      now,
      limit: EXPIRED_PURGE_BATCH_LIMIT,
    });
    this.lastExpiredPurgeAtMs = now;
  }

  private rowToEntry(row: unknown): ScratchEntry {
    const parsed = ScratchRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new PersistenceError(
        "CORRUPTED_RECORD",
        `scratch row failed validation: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    const r = parsed.data;
    return {
      key: r.key,
      identifier: r.identifier,
      format: r.format,
      bytes: r.bytes,
      content_type: r.content_type ?? undefined,
      digest: r.digest,
      size: r.size,
      created_at: r.created_at,
      expires_at: r.expires_at ?? undefined,
    };
  }

  async put(entry: ScratchPut): Promise<ArtifactRef> {
    if (entry.key === "") {
      throw new ScratchError("INVALID_REQUEST", "scratch key must not be empty");
    }
    if (this.maxBytes !== undefined && entry.bytes.byteLength > this.maxBytes) {
      throw new ScratchError(
        "DATA_TOO_LARGE",
        `artifact for ${entry.key} is ${entry.bytes.byteLength} bytes (limit: ${this.maxBytes})`,
      );
    }

    const now = this.now();
    const ttl = entry.ttl_seconds ?? this.defaultTtlSeconds;
    const ref: ArtifactRef = {
      key: entry.key,
      digest: sha256Hex(entry.bytes),
      size: entry.bytes.byteLength,
    };

    guard("scratch put", () => {
      this.maybePurgeExpired(now);
      this.stmts.upsert.run({
        key: entry.key,
        identifier: entry.identifier,
        format: entry.format,
        bytes: Buffer.from(entry.bytes),
        content_type: entry.content_type ?? null,
        digest: ref.digest,
        size: ref.size,
        created_at: now,
        expires_at: ttl !== undefined ? now + ttl * 1000 : null,
      });
    });
    return ref;
  }

  async get(key: string): Promise<ScratchEntry | null> {
    const row = guard("scratch get", () => this.stmts.fetch.get(key, this.now()));
    return row === undefined ? null : this.rowToEntry(row);
  }

  async has(ref: ArtifactRef): Promise<boolean> {
    const row = guard("scratch has", () =>
      this.stmts.fetchDigest.get(ref.key, this.now()),
    );
    const parsed = RefRowSchema.safeParse(row);
    return parsed.success && parsed.data.digest === ref.digest;
  }

  async delete(key: string): Promise<void> {
    guard("scratch delete", () => this.stmts.remove.run(key));
  }

  async purgeExpired(): Promise<number> {
    const now = this.now();
    const result = guard("scratch purge", () =>
      this.stmts.purgeExpired.run(now),
    );
    this.lastExpiredPurgeAtMs = now;
    return result.changes;
  }
}
