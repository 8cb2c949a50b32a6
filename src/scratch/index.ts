export { ScratchError, type ScratchErrorCode } from "./errors.js";
export { SqliteScratchStore, type SqliteScratchStoreOptions } from "./sqlite.js";
export type { ScratchEntry, ScratchPut, ScratchStore } from "./store.js";
