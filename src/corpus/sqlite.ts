import type { Statement } from "better-sqlite3";
import { z } from "zod";
import {
  type DatabaseSource,
  PersistenceError,
  type SqliteDatabase,
  guard,
  resolveDatabase,
  sha256Hex,
  stableStringify,
} from "../persistence/index.js";
import { normalizeIdentifier } from "../queue/index.js";
import {
  type StructuredDocument,
  StructuredDocumentSchema,
} from "../schemas/index.js";
import type { CorpusRecord, CorpusWriter, UpsertResult } from "./writer.js";

const CorpusRowSchema = z.object({
  key: z.string(),
  identifier: z.string(),
  document_json: z.string(),
  digest: z.string(),
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

const VersionRowSchema = z.object({ digest: z.string(), version: z.number().int() });
const CountRowSchema = z.object({ n: z.number().int() });

function parseDocument(json: string): StructuredDocument | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return undefined;
  }
  const parsed = StructuredDocumentSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export type SqliteCorpusStoreOptions = DatabaseSource & {
  now?: () => Date;
};

export class SqliteCorpusStore implements CorpusWriter {
  private readonly db: SqliteDatabase;
  private readonly owned: boolean;
  private readonly now: () => Date;
  private readonly stmts: {
    fetch: Statement;
    fetchVersion: Statement;
    insert: Statement;
    replace: Statement;
    count: Statement;
  };

  constructor(opts: SqliteCorpusStoreOptions) {
    const { db, owned } = resolveDatabase(opts);
    this.db = db;
    this.owned = owned;
    this.now = opts.now ?? (() => new Date());
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    if (this.owned) this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS corpus_documents (
        key            TEXT PRIMARY KEY,
        identifier     TEXT NOT NULL,
        document_json  TEXT NOT NULL,
        digest         TEXT NOT NULL,
        version        INTEGER NOT NULL,
        created_at     TEXT NOT NULL,
        updated_at     TEXT NOT NULL
      );
    `);
  }

  private prepareStatements() {
    return {
      fetch: this.db.prepare(`SELECT * FROM corpus_documents WHERE key = ?`),
      fetchVersion: this.db.prepare(
        `SELECT digest, version FROM corpus_documents WHERE key = ?`,
      ),
      insert: this.db.prepare(`
        INSERT INTO corpus_documents (
          key, identifier, document_json, digest, version, created_at, updated_at
        ) VALUES (
          @key, @identifier, @document_json, @digest, 1, @now, @now
        )
      `),
      replace: this.db.prepare(`
        UPDATE corpus_documents SET
          identifier = @identifier,
          document_json = @document_json,
          digest = @digest,
          version = version + 1,
          updated_at = @now
        WHERE key = @key
      `),
      count: this.db.prepare(`SELECT COUNT(*) AS n FROM corpus_documents`),
    };
  }

  async upsert(
    identifier: string,
    document: StructuredDocument,
  ): Promise<UpsertResult> {
    const key = normalizeIdentifier(identifier);
    const documentJson = stableStringify(document);
    const digest = sha256Hex(documentJson);

    return guard("corpus upsert", () =>
      this.db.transaction((): UpsertResult => {
        const existing = VersionRowSchema.safeParse(this.stmts.fetchVersion.get(key));
        if (existing.success && existing.data.digest === digest) {
          return { key, version: existing.data.version, digest, changed: false };
        }
        const params = {
          key,
          identifier,
          document_json: documentJson,
          digest,
          now: this.now().toISOString(),
        };
        if (existing.success) {
          this.stmts.replace.run(params);
          return { key, version: existing.data.version + 1, digest, changed: true };
        }
        this.stmts.insert.run(params);
        return { key, version: 1, digest, changed: true };
      })(),
    );
  }

  async get(identifier: string): Promise<CorpusRecord | null> {
    const key = normalizeIdentifier(identifier);
    const row = guard("corpus get", () => this.stmts.fetch.get(key));
    if (row === undefined) return null;

    const parsed = CorpusRowSchema.safeParse(row);
    const document = parsed.success
      ? parseDocument(parsed.data.document_json)
      : undefined;
    if (!parsed.success || !document) {
      throw new PersistenceError(
        "CORRUPTED_RECORD",
        `corpus record for ${key} failed validation`,
      );
    }
    const { document_json: _json, ...rest } = parsed.data;
    return { ...rest, document };
  }

  async count(): Promise<number> {
    const row = guard("corpus count", () => this.stmts.count.get());
    const parsed = CountRowSchema.safeParse(row);
    return parsed.success ? parsed.data.n : 0;
  }
}
