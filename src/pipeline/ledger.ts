import type { Statement } from "better-sqlite3";
import { monotonicFactory } from "ulid";
import { z } from "zod";
import {
  type DatabaseSource,
  PersistenceError,
  type SqliteDatabase,
  guard,
  resolveDatabase,
} from "../persistence/index.js";
import { normalizeIdentifier } from "../queue/index.js";
import {
  type FetchOutcome,
  type IdentifierState,
  IdentifierStateSchema,
  type LedgerEntry,
  LedgerEntrySchema,
  type ParseFailure,
  type WorkIdentifier,
} from "../schemas/index.js";
import { PipelineError } from "./errors.js";
import { assertTransition } from "./states.js";

/** `parse_failure: null` clears a failure recorded by an earlier run. */
export interface TransitionPatch {
  fetch_outcome?: FetchOutcome;
  parse_failure?: ParseFailure | null;
}

/**
 * Per-identifier record of pipeline state. Survives across runs so a new
 * run can resume where the last one stopped.
 */
export interface OutcomeLedger {
  /**
   * Creates a QUEUED entry, or adds the batch label to an existing one
   * without touching its state.
   */
  register(item: WorkIdentifier, run_id: string): Promise<LedgerEntry>;

  get(identifier: string): Promise<LedgerEntry | null>;

  /** Validates the move, then writes the new state and one event. */
  transition(
    identifier: string,
    to: IdentifierState,
    run_id: string,
    patch?: TransitionPatch,
  ): Promise<LedgerEntry>;

  listByState(state: IdentifierState): Promise<LedgerEntry[]>;
}

const EntryRowSchema = z.object({
  key: z.string(),
  identifier: z.string(),
  state: IdentifierStateSchema,
  batches_json: z.string(),
  run_id: z.string(),
  fetch_outcome_json: z.string().nullable(),
  parse_failure_json: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

type EntryRow = z.infer<typeof EntryRowSchema>;

const EventRowSchema = z.object({
  id: z.string(),
  state: IdentifierStateSchema,
  run_id: z.string(),
  at: z.string(),
});

function parseJson(json: string | null): unknown {
  if (json === null) return undefined;
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}

export type SqliteOutcomeLedgerOptions = DatabaseSource & {
  now?: () => Date;
};

export class SqliteOutcomeLedger implements OutcomeLedger {
  private readonly db: SqliteDatabase;
  private readonly owned: boolean;
  private readonly now: () => Date;
  private readonly nextId = monotonicFactory();
  private readonly stmts: {
    fetch: Statement;
    fetchByState: Statement;
    events: Statement;
    insert: Statement;
    updateBatches: Statement;
    updateState: Statement;
    insertEvent: Statement;
  };

  constructor(opts: SqliteOutcomeLedgerOptions) {
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
      CREATE TABLE IF NOT EXISTS ledger_entries (
        key                 TEXT PRIMARY KEY,
        identifier          TEXT NOT NULL,
        state               TEXT NOT NULL,
        batches_json        TEXT NOT NULL,
        run_id              TEXT NOT NULL,
        fetch_outcome_json  TEXT,
        parse_failure_json  TEXT,
        created_at          TEXT NOT NULL,
        updated_at          TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_state ON ledger_entries(state);

      CREATE TABLE IF NOT EXISTS ledger_events (
        seq     INTEGER PRIMARY KEY AUTOINCREMENT,
        id      TEXT NOT NULL UNIQUE,
        key     TEXT NOT NULL,
        state   TEXT NOT NULL,
        run_id  TEXT NOT NULL,
        at      TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_events_key ON ledger_events(key, seq);
    `);
  }

  private prepareStatements() {
    return {
      fetch: this.db.prepare(`SELECT * FROM ledger_entries WHERE key = ?`),
      fetchByState: this.db.prepare(
        `SELECT * FROM ledger_entries WHERE state = ? ORDER BY created_at, key`,
      ),
      events: this.db.prepare(
        `SELECT id, state, run_id, at FROM ledger_events WHERE key = ? ORDER BY seq`,
      ),
      insert: this.db.prepare(`
        INSERT INTO ledger_entries (
          key, identifier, state, batches_json, run_id, created_at, updated_at
        ) VALUES (
          @key, @identifier, 'QUEUED', @batches_json, @run_id, @now, @now
        )
      `),
      updateBatches: this.db.prepare(`
        UPDATE ledger_entries SET
          batches_json = @batches_json,
          run_id = @run_id,
          updated_at = @now
        WHERE key = @key
      `),
      updateState: this.db.prepare(`
        UPDATE ledger_entries SET
          state = @state,
          run_id = @run_id,
          fetch_outcome_json = @fetch_outcome_json,
          parse_failure_json = @parse_failure_json,
          updated_at = @now
        WHERE key = @key
      `),
      insertEvent: this.db.prepare(`
        INSERT INTO ledger_events (id, key, state, run_id, at)
        VALUES (@id, @key, @state, @run_id, @at)
      `),
    };
  }

  private readRow(key: string): EntryRow | undefined {
    const row = guard("ledger get", () => this.stmts.fetch.get(key));
    if (row === undefined) return undefined;
    const parsed = EntryRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new PersistenceError(
        "CORRUPTED_RECORD",
        `ledger row for ${key} failed validation`,
      );
    }
    return parsed.data;
  }

  private toEntry(row: EntryRow): LedgerEntry {
    const events = z
      .array(EventRowSchema)
      .safeParse(guard("ledger events", () => this.stmts.events.all(row.key)));
    const parsed = LedgerEntrySchema.safeParse({
      identifier: row.identifier,
      key: row.key,
      state: row.state,
      batches: parseJson(row.batches_json),
      run_id: row.run_id,
      fetch_outcome: parseJson(row.fetch_outcome_json),
      parse_failure: parseJson(row.parse_failure_json),
      events: events.success ? events.data : null,
      created_at: row.created_at,
      updated_at: row.updated_at,
    });
    if (!parsed.success) {
      throw new PersistenceError(
        "CORRUPTED_RECORD",
        `ledger entry for ${row.key} failed validation: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    return parsed.data;
  }

  private appendEvent(key: string, state: IdentifierState, run_id: string, at: string): void {
    this.stmts.insertEvent.run({ id: this.nextId(), key, state, run_id, at });
  }

  async register(item: WorkIdentifier, run_id: string): Promise<LedgerEntry> {
    const key = normalizeIdentifier(item.identifier);
    const now = this.now().toISOString();
    const current = this.readRow(key);

    if (current === undefined) {
      guard("ledger register", () =>
        this.db.transaction(() => {
          this.stmts.insert.run({
            key,
            identifier: item.identifier,
            batches_json: JSON.stringify([item.batch]),
            run_id,
            now,
          });
          this.appendEvent(key, "QUEUED", run_id, now);
        })(),
      );
    } else {
      const batches = this.toEntry(current).batches;
      if (!batches.includes(item.batch)) batches.push(item.batch);
      guard("ledger register", () =>
        this.stmts.updateBatches.run({
          key,
          batches_json: JSON.stringify(batches),
          run_id,
          now,
        }),
      );
    }
    return this.mustGet(key);
  }

  async get(identifier: string): Promise<LedgerEntry | null> {
    const row = this.readRow(normalizeIdentifier(identifier));
    return row ? this.toEntry(row) : null;
  }

  async transition(
    identifier: string,
    to: IdentifierState,
    run_id: string,
    patch: TransitionPatch = {},
  ): Promise<LedgerEntry> {
    const key = normalizeIdentifier(identifier);
    const current = this.readRow(key);
    if (current === undefined) {
      throw new PipelineError(
        "INVALID_TRANSITION",
        `Cannot move ${key} to ${to}: identifier was never registered`,
        { key, to },
      );
    }
    assertTransition(key, current.state, to);

    const now = this.now().toISOString();
    const fetchOutcomeJson =
      patch.fetch_outcome !== undefined
        ? JSON.stringify(patch.fetch_outcome)
        : current.fetch_outcome_json;
    let parseFailureJson = current.parse_failure_json;
    if (patch.parse_failure === null) parseFailureJson = null;
    else if (patch.parse_failure !== undefined) {
      parseFailureJson = JSON.stringify(patch.parse_failure);
    }

    guard("ledger transition", () =>
      this.db.transaction(() => {
        this.stmts.updateState.run({
          key,
          state: to,
          run_id,
          fetch_outcome_json: fetchOutcomeJson,
          parse_failure_json: parseFailureJson,
          now,
        });
        this.appendEvent(key, to, run_id, now);
      })(),
    );
    return this.mustGet(key);
  }

  async listByState(state: IdentifierState): Promise<LedgerEntry[]> {
    const rows = guard("ledger list", () => this.stmts.fetchByState.all(state));
    return rows.map((row) => {
      const parsed = EntryRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new PersistenceError("CORRUPTED_RECORD", "ledger row failed validation");
      }
      return this.toEntry(parsed.data);
    });
  }

  private mustGet(key: string): LedgerEntry {
    const row = this.readRow(key);
    if (row === undefined) {
      throw new PersistenceError("STORE_FAILURE", `ledger entry for ${key} vanished after write`);
    }
    return this.toEntry(row);
  }
}
