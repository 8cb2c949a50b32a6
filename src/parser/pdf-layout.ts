import type { SectionCollector } from "./builder.js";
import { collapseWhitespace } from "./text.js";

/** One visual line of a page's text layer */
export interface TextLine {
  text: string;
  fontSize: number;
  y: number; // baseline, grows upward
  page: number;
}

const HEADING_SIZE_RATIO = 1.15;
const MAX_HEADING_CHARS = 100;
const PARAGRAPH_GAP_RATIO = 1.6;

const CANONICAL_HEADING =
  /^(?:(?:\d+(?:\.\d+)*\.?|[IVX]+\.)\s+)?(?:abstract|introduction|background|experimental(?: section| details)?|materials and methods|methods|methodology|results(?: and discussion)?|discussion|conclusions?|summary|acknowledge?ments?|references)\s*:?$/i;
const SUBSECTION_NUMBER = /^\d+\.\d+/;

/** Character-weighted mode of line font sizes, to 0.5pt */
export function bodyFontSize(lines: readonly TextLine[]): number {
  const weights = new Map<number, number>();
  for (const line of lines) {
    const size = Math.round(line.fontSize * 2) / 2;
    weights.set(size, (weights.get(size) ?? 0) + line.text.length);
  }
  let best = 0;
  let bestWeight = -1;
  for (const [size, weight] of weights) {
    if (weight > bestWeight) {
      best = size;
      bestWeight = weight;
    }
  }
  return best;
}

export function isHeadingLine(line: TextLine, bodySize: number): boolean {
  const text = line.text.trim();
  if (CANONICAL_HEADING.test(text)) return true;
  return (
    bodySize > 0 &&
    line.fontSize >= bodySize * HEADING_SIZE_RATIO &&
    text.length <= MAX_HEADING_CHARS &&
    /[A-Za-z]/.test(text) &&
    !/[.,;]$/.test(text)
  );
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function joinLine(paragraph: string, line: string): string {
  if (paragraph === "") return line;
  // "synthe-" + "sized" → "synthesized"
  if (/[A-Za-z]-$/.test(paragraph) && /^[a-z]/.test(line)) {
    return paragraph.slice(0, -1) + line;
  }
  return `${paragraph} ${line}`;
}

/**
 * Turn positioned lines into headings and paragraphs. A vertical gap
 * well above the typical line spacing ends a paragraph; numbered
 * subsections ("2.1 ...") take the last top-level heading as parent.
 */
export function layoutLines(
  lines: readonly TextLine[],
  collector: SectionCollector,
): void {
  const body = bodyFontSize(lines);
  const gaps: number[] = [];
  for (let i = 1; i < lines.length; i++) {
    const gap = lines[i - 1].y - lines[i].y;
    if (lines[i].page === lines[i - 1].page && gap > 0) gaps.push(gap);
  }
  const breakGap = median(gaps) * PARAGRAPH_GAP_RATIO;

  let paragraph = "";
  let topHeading: string | undefined;
  const flush = () => {
    if (paragraph !== "") collector.paragraph(paragraph);
    paragraph = "";
  };

  lines.forEach((line, i) => {
    const text = collapseWhitespace(line.text);
    if (text === "") return;

    if (isHeadingLine(line, body)) {
      flush();
      if (SUBSECTION_NUMBER.test(text)) {
        collector.heading(text, topHeading);
      } else {
        topHeading = text;
        collector.heading(text);
      }
      return;
    }

    const previous = i > 0 ? lines[i - 1] : undefined;
    if (
      previous &&
      previous.page === line.page &&
      breakGap > 0 &&
      previous.y - line.y > breakGap
    ) {
      flush();
    }
    paragraph = joinLine(paragraph, text);
  });
  flush();
}
