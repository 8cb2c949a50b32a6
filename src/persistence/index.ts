export {
  type DatabaseSource,
  guard,
  openDatabase,
  resolveDatabase,
  type SqliteDatabase,
} from "./database.js";
export { contentDigest, sha256Hex, stableStringify } from "./digest.js";
export type { PersistenceErrorCode } from "./errors.js";
export { PersistenceError } from "./errors.js";
