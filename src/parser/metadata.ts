import type { DocumentMetadata } from "../schemas/index.js";
import { collapseWhitespace } from "./text.js";

/** What a strategy extracts; format and confidence are added by the parser. */
export type ExtractedMetadata = Omit<DocumentMetadata, "format" | "confidence">;

const DOI_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*|info:doi\/)/i;
const DOI_SHAPE = /^10\.\d{4,9}\/\S+$/;
const YEAR = /\b(1[89]\d{2}|20\d{2})\b/;

export function cleanDoi(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const doi = collapseWhitespace(raw).replace(DOI_PREFIX, "");
  return DOI_SHAPE.test(doi) ? doi : undefined;
}

export function parseYear(raw: string | undefined): number | undefined {
  const match = raw?.match(YEAR);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

/** First non-blank candidate, whitespace-collapsed */
export function firstText(
  ...candidates: Array<string | undefined>
): string | undefined {
  for (const candidate of candidates) {
    const text = candidate ? collapseWhitespace(candidate) : "";
    if (text !== "") return text;
  }
  return undefined;
}

/** Whitespace-collapsed, blank-free, first occurrence kept */
export function uniqueNames(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const clean = collapseWhitespace(name);
    if (clean === "" || seen.has(clean.toLowerCase())) continue;
    seen.add(clean.toLowerCase());
    result.push(clean);
  }
  return result;
}
