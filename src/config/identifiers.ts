import { readFileSync } from "node:fs";
import { type IdentifierInput, IdentifierInputSchema } from "../schemas/index.js";
import { ConfigError } from "./errors.js";

/**
 * Read the identifier list handed over by the search stage: a JSON array
 * of DOI strings or `{ identifier, batch? }` objects.
 */
export function loadIdentifiers(path: string): IdentifierInput {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("IDENTIFIERS_UNREADABLE", `Cannot read identifiers from ${path}: ${reason}`);
  }

  const parsed = IdentifierInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(
      "IDENTIFIERS_UNREADABLE",
      `Identifier list in ${path} is malformed`,
      issues,
    );
  }
  return parsed.data;
}
