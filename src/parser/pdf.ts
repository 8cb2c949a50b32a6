import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { SectionCollector } from "./builder.js";
import {
  type ExtractedMetadata,
  cleanDoi,
  firstText,
  uniqueNames,
} from "./metadata.js";
import { type TextLine, layoutLines } from "./pdf-layout.js";
import type { Extraction, ParseInput, ParseStrategy } from "./strategy.js";

const SAME_BASELINE_TOLERANCE = 2;
const DOI_IN_TEXT = /\b10\.\d{4,9}\/[^\s"<>]+/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(
  record: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
  fontSize: number;
}

function toLines(items: readonly PositionedText[], page: number): TextLine[] {
  const lines: TextLine[] = [];
  let current: (TextLine & { end: number }) | undefined;
  for (const item of items) {
    if (item.str === "") continue;
    if (current && Math.abs(current.y - item.y) <= SAME_BASELINE_TOLERANCE) {
      const needsSpace =
        item.x > current.end + 0.5 &&
        !/\s$/.test(current.text) &&
        !/^\s/.test(item.str);
      current.text += (needsSpace ? " " : "") + item.str;
      current.fontSize = Math.max(current.fontSize, item.fontSize);
      current.end = item.x + item.width;
      continue;
    }
    if (current) lines.push(current);
    current = {
      text: item.str,
      fontSize: item.fontSize,
      y: item.y,
      page,
      end: item.x + item.width,
    };
  }
  if (current) lines.push(current);
  return lines.map(({ text, fontSize, y, page: p }) => ({ text, fontSize, y, page: p }));
}

/** Text-layer extraction; scanned PDFs without text come back empty. */
export class PdfStrategy implements ParseStrategy {
  readonly format = "pdf";

  async extract(input: ParseInput): Promise<Extraction> {
    const task = getDocument({
      data: new Uint8Array(input.bytes), // pdfjs takes ownership of the buffer
      verbosity: 0,
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
    });
    try {
      const doc = await task.promise;
      const lines: TextLine[] = [];
      for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!("str" in item)) continue;
          items.push({
            str: item.str,
            x: item.transform[4],
            y: item.transform[5],
            width: item.width,
            fontSize: Math.abs(item.transform[3]) || item.height,
          });
        }
        lines.push(...toLines(items, pageNumber));
        page.cleanup();
      }

      const collector = new SectionCollector();
      layoutLines(lines, collector);
      const { info } = await doc.getMetadata();
      return {
        content: collector.build(),
        metadata: this.metadata(isRecord(info) ? info : {}),
      };
    } finally {
      await task.destroy();
    }
  }

  private metadata(info: Record<string, unknown>): ExtractedMetadata {
    const title = stringField(info, "Title");
    const author = stringField(info, "Author");
    const doiSource = [stringField(info, "Subject"), stringField(info, "Keywords")]
      .map((value) => value?.match(DOI_IN_TEXT)?.[0])
      .find((value) => value !== undefined);
    return {
      // Producers often leave the source file name here
      title: title && !/\.(pdf|docx?|tex)$/i.test(title.trim()) ? firstText(title) : undefined,
      authors: author ? uniqueNames(author.split(/\s*(?:;|\band\b)\s*/)) : [],
      doi: cleanDoi(doiSource?.replace(/[.,;)]+$/, "")),
    };
  }
}
