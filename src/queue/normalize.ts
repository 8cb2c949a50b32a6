const IDENTIFIER_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;

/**
 * Normalize a work identifier into the key used by every store.
 *
 * Rules:
 * 1. Trim leading/trailing whitespace
 * 2. Strip resolver URL or `doi:` prefixes
 * 3. Lowercase (DOIs are case-insensitive)
 *
 * Examples:
 * - " 10.1016/J.Cell.2020.01.001 " → "10.1016/j.cell.2020.01.001"
 * - "https://doi.org/10.1039/C9TA00001A" → "10.1039/c9ta00001a"
 * - "doi:10.1002/anie.201" → "10.1002/anie.201"
 */
export function normalizeIdentifier(raw: string): string {
  return raw.trim().replace(IDENTIFIER_PREFIX, "").trim().toLowerCase();
}

/**
 * File-name safe form of an identifier: alphanumerics only, case kept,
 * matching the names hand-downloaded files are saved under.
 * "10.1039/C9TA00001A" → "101039C9TA00001A"
 */
export function safeIdentifier(identifier: string): string {
  return identifier
    .trim()
    .replace(IDENTIFIER_PREFIX, "")
    .replace(/[^A-Za-z0-9]/g, "");
}
