import type { ArtifactFormat } from "../schemas/index.js";
import type { BuiltContent } from "./builder.js";

/** Fraction of an artifact's bytes expected to survive as body text */
const EXPECTED_TEXT_RATIO: Record<ArtifactFormat, number> = {
  html: 0.2,
  xml: 0.5,
  pdf: 0.1,
};

const FULL_STRUCTURE_HEADINGS = 3;
const FULL_DENSITY_PARAGRAPHS = 10;

/**
 * Heuristic extraction quality in [0, 1]:
 * 50% text coverage against the format's expected ratio, 30% heading
 * structure, 20% paragraph density. Zero when nothing was extracted.
 */
export function scoreConfidence(
  content: Pick<BuiltContent, "headings" | "paragraphs" | "textChars">,
  format: ArtifactFormat,
  artifactBytes: number,
): number {
  if (content.paragraphs === 0 || artifactBytes <= 0) return 0;
  const coverage = Math.min(
    1,
    content.textChars / (artifactBytes * EXPECTED_TEXT_RATIO[format]),
  );
  const structure = Math.min(1, content.headings / FULL_STRUCTURE_HEADINGS);
  const density = Math.min(1, content.paragraphs / FULL_DENSITY_PARAGRAPHS);
  const score = 0.5 * coverage + 0.3 * structure + 0.2 * density;
  return Math.round(score * 100) / 100;
}
