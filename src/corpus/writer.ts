import type { StructuredDocument } from "../schemas/index.js";

export interface UpsertResult {
  key: string;
  version: number;
  digest: string;
  changed: boolean; // false when the stored document was already identical
}

export interface CorpusRecord {
  key: string;
  identifier: string;
  document: StructuredDocument;
  digest: string;
  version: number;
  created_at: string;
  updated_at: string;
}

/**
 * Durable home of parsed documents, one record per normalized identifier.
 * Upserts replace atomically and are idempotent; the document passed in
 * is never modified. Store failures surface as PersistenceError.
 */
export interface CorpusWriter {
  upsert(identifier: string, document: StructuredDocument): Promise<UpsertResult>;
  get(identifier: string): Promise<CorpusRecord | null>;
  count(): Promise<number>;
}
