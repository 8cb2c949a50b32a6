import { createHash } from "node:crypto";

/** SHA-256 as hex string (64 characters) */
export function sha256Hex(data: string | Uint8Array): string {
  const hash = createHash("sha256");
  if (typeof data === "string") {
    hash.update(data, "utf8");
  } else {
    hash.update(data);
  }
  return hash.digest("hex");
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  return !Array.isArray(value);
}

/**
 * Deterministic JSON serialization with sorted keys (recursive).
 *
 * Rules:
 * - Primitive values: delegate to JSON.stringify
 * - Arrays: preserve order, recurse into elements; undefined → null
 * - Objects: sort keys alphabetically, recurse into values
 * - Omit keys with `undefined` values (matches JSON.stringify behavior)
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",")}]`;
  }
  if (!isPlainRecord(value)) return "null";
  const keys = Object.keys(value)
    .filter((k) => value[k] !== undefined)
    .sort();
  const pairs = keys.map(
    (k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`,
  );
  return `{${pairs.join(",")}}`;
}

/** Content digest of a JSON-compatible value, independent of key order */
export function contentDigest(value: unknown): string {
  return sha256Hex(stableStringify(value));
}
