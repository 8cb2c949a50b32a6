export { SqliteCorpusStore, type SqliteCorpusStoreOptions } from "./sqlite.js";
export type { CorpusRecord, CorpusWriter, UpsertResult } from "./writer.js";
