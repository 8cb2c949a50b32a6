import type { SectionKind } from "../schemas/index.js";

const NON_CONTENT = [
  "acknow",
  "reference",
  "author",
  "highlight",
  "supple",
  "citing",
  "appendix",
  "fund",
  "nomencl",
  "support",
  "times cited",
  "publication history",
  "keywords",
  "key words",
  "conflict",
];
const METHODS_PARENT = ["experi", "method"];
const RECIPE = ["material", "reage", "prep", "treat", "depo", "processing", "synth", "fabrica"];
const NOT_RECIPE = ["charac", "detect", "analys", "measurement", "quanti", "test"];
const MEASUREMENT = [
  "charac",
  "test",
  "analys",
  "measurement",
  "quanti",
  "identi",
  "scopy",
  "spectro",
  "x-ray",
  "diffrac",
  "quali",
  "xr",
];
const NOT_MEASUREMENT = ["synth", "prepar"];

const includesAny = (text: string, keys: readonly string[]) =>
  keys.some((key) => text.includes(key));

/**
 * Classify a section from its title and the title of the heading above it.
 * Rules are checked in order; the first match wins.
 */
export function classifySection(title: string, parent = ""): SectionKind {
  const section = title.toLowerCase();
  const supersection = parent.toLowerCase();
  const both = `${section} ${supersection}`;

  if (includesAny(both, NON_CONTENT)) return "null";
  if (section.includes("abstract")) return "abstract";
  if (section.includes("intro") || supersection.includes("intro")) return "intro";
  if (includesAny(both, ["result", "discuss"])) return "results";
  if (both.includes("conclu")) return "conclusions";

  const underMethods = includesAny(supersection, METHODS_PARENT);
  if (
    underMethods &&
    includesAny(section, RECIPE) &&
    !includesAny(both, NOT_RECIPE)
  ) {
    return "recipe";
  }
  if (
    underMethods &&
    includesAny(section, MEASUREMENT) &&
    !includesAny(both, NOT_MEASUREMENT)
  ) {
    return "nonrecipe_methods";
  }
  return "other";
}
