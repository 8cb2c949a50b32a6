export { QueueError, type QueueErrorCode } from "./errors.js";
export { type EnqueueResult, IdentifierQueue } from "./identifier-queue.js";
export { normalizeIdentifier, safeIdentifier } from "./normalize.js";
