import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { openDatabase, sha256Hex, stableStringify } from "../../persistence/index.js";
import type { StructuredDocument } from "../../schemas/index.js";
import { SqliteCorpusStore } from "../sqlite.js";

function makeDocument(paragraph = "Carbon was activated."): StructuredDocument {
  return {
    identifier: "10.1016/J.Carbon.1",
    sections: [
      {
        title: "Results",
        order: 0,
        kind: "results",
        paragraphs: [{ text: paragraph, order: 0 }],
      },
    ],
    metadata: {
      title: "Activated Carbon",
      authors: ["Ada Lovelace"],
      format: "html",
      confidence: 0.42,
    },
  };
}

describe("SqliteCorpusStore", () => {
  let store: SqliteCorpusStore;

  beforeEach(() => {
    store = new SqliteCorpusStore({
      dbPath: ":memory:",
      now: () => new Date("2026-01-02T03:04:05.000Z"),
    });
  });

  afterEach(() => {
    store.close();
  });

  test("first upsert creates version 1 keyed by normalized identifier", async () => {
    const doc = makeDocument();
    const result = await store.upsert("10.1016/J.Carbon.1", doc);

    expect(result).toEqual({
      key: "10.1016/j.carbon.1",
      version: 1,
      digest: sha256Hex(stableStringify(doc)),
      changed: true,
    });
    expect(await store.count()).toBe(1);
  });

  test("upserting the same document twice leaves identical state", async () => {
    const doc = makeDocument();
    await store.upsert("10.1016/J.Carbon.1", doc);
    const before = await store.get("10.1016/j.carbon.1");

    const again = await store.upsert("doi:10.1016/j.carbon.1", makeDocument());

    expect(again.changed).toBe(false);
    expect(again.version).toBe(1);
    expect(await store.get("10.1016/j.carbon.1")).toEqual(before);
    expect(await store.count()).toBe(1);
  });

  test("a changed document replaces the record and bumps the version", async () => {
    await store.upsert("10.1016/J.Carbon.1", makeDocument());
    const updated = makeDocument("Carbon was activated twice.");

    const result = await store.upsert("10.1016/J.Carbon.1", updated);
    const record = await store.get("10.1016/J.Carbon.1");

    expect(result.changed).toBe(true);
    expect(result.version).toBe(2);
    expect(record?.document).toEqual(updated);
    expect(record?.version).toBe(2);
    expect(await store.count()).toBe(1);
  });

  test("key order in the document does not change the digest", async () => {
    const doc = makeDocument();
    const reordered: StructuredDocument = {
      metadata: { ...doc.metadata },
      sections: doc.sections,
      identifier: doc.identifier,
    };
    const first = await store.upsert("k", doc);
    const second = await store.upsert("k", reordered);
    expect(second.digest).toBe(first.digest);
    expect(second.changed).toBe(false);
  });

  test("never mutates the document it is given", async () => {
    const doc = makeDocument();
    const snapshot = structuredClone(doc);
    await store.upsert("k", doc);
    expect(doc).toEqual(snapshot);
  });

  test("get returns null for unknown identifiers", async () => {
    expect(await store.get("10.1/none")).toBeNull();
  });

  test("a record that fails validation is CORRUPTED_RECORD", async () => {
    const db = openDatabase(":memory:");
    const shared = new SqliteCorpusStore({ db });
    await shared.upsert("k", makeDocument());
    db.prepare("UPDATE corpus_documents SET document_json = ? WHERE key = ?").run(
      '{"identifier":"k"}',
      "k",
    );

    await expect(shared.get("k")).rejects.toMatchObject({
      code: "CORRUPTED_RECORD",
    });
    db.close();
  });

  test("driver failures surface as STORE_FAILURE", async () => {
    const db = openDatabase(":memory:");
    const shared = new SqliteCorpusStore({ db });
    db.close();

    await expect(shared.upsert("k", makeDocument())).rejects.toMatchObject({
      name: "PersistenceError",
      code: "STORE_FAILURE",
    });
  });
});
