import { type Logger, componentLogger } from "../logger.js";
import { PUBLISHER_NAMES, identifyPublisher } from "../resolver/index.js";
import type {
  ArtifactFormat,
  ArtifactRef,
  DetectedFormat,
  ParseFailure,
  ParseFailureCode,
  StructuredDocument,
} from "../schemas/index.js";
import type { ScratchStore } from "../scratch/index.js";
import { scoreConfidence } from "./confidence.js";
import { HtmlStrategy } from "./html.js";
import { cleanDoi } from "./metadata.js";
import { PdfStrategy } from "./pdf.js";
import type { Extraction, ParseInput, ParseStrategy } from "./strategy.js";
import { XmlStrategy } from "./xml.js";

export type ParseResult =
  | { status: "parsed"; document: StructuredDocument }
  | { status: "failed"; failure: ParseFailure };

const failed = (code: ParseFailureCode, message: string): ParseResult => ({
  status: "failed",
  failure: { code, message },
});

export interface DocumentParserOptions {
  scratch: ScratchStore;
  strategies?: ParseStrategy[];
  logger?: Logger;
}

export function defaultStrategies(): ParseStrategy[] {
  return [new HtmlStrategy(), new XmlStrategy(), new PdfStrategy()];
}

/**
 * Turns a fetched artifact into a StructuredDocument. Dispatches on format
 * to a registered strategy; never throws for content problems, only for
 * scratch storage failures.
 */
export class DocumentParser {
  private readonly scratch: ScratchStore;
  private readonly strategies = new Map<ArtifactFormat, ParseStrategy>();
  private readonly log: Logger;

  constructor(opts: DocumentParserOptions) {
    this.scratch = opts.scratch;
    this.log = componentLogger("parser", opts.logger);
    for (const strategy of opts.strategies ?? defaultStrategies()) {
      this.register(strategy);
    }
  }

  register(strategy: ParseStrategy): void {
    this.strategies.set(strategy.format, strategy);
  }

  supports(format: DetectedFormat): boolean {
    return format !== "unknown" && this.strategies.has(format);
  }

  async parse(ref: ArtifactRef, format: DetectedFormat): Promise<ParseResult> {
    if (!this.supports(format)) {
      return failed("UNSUPPORTED_FORMAT", `no parse strategy for format "${format}"`);
    }
    const entry = await this.scratch.get(ref.key);
    if (!entry || entry.digest !== ref.digest) {
      return failed(
        "ARTIFACT_MISSING",
        entry
          ? `scratch artifact for ${ref.key} changed since it was fetched`
          : `no scratch artifact for ${ref.key}`,
      );
    }
    return this.parseBytes(
      { identifier: entry.identifier, bytes: entry.bytes, content_type: entry.content_type },
      format,
    );
  }

  /** Parse bytes already in hand; `parse` is this plus the scratch lookup. */
  async parseBytes(input: ParseInput, format: DetectedFormat): Promise<ParseResult> {
    const strategy = format === "unknown" ? undefined : this.strategies.get(format);
    if (!strategy) {
      return failed("UNSUPPORTED_FORMAT", `no parse strategy for format "${format}"`);
    }

    let extraction: Extraction;
    try {
      extraction = await strategy.extract(input);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ identifier: input.identifier, format, err }, "parse strategy failed");
      return failed("MALFORMED_ARTIFACT", `${format} artifact could not be read: ${reason}`);
    }

    const { content, metadata } = extraction;
    if (content.paragraphs === 0) {
      return failed("EMPTY_CONTENT", `no paragraphs extracted from ${format} artifact`);
    }

    const abstractSection = content.sections.find((s) => s.kind === "abstract");
    const publisher = identifyPublisher(input.identifier);
    const document: StructuredDocument = {
      identifier: input.identifier,
      sections: content.sections,
      metadata: {
        ...metadata,
        doi: metadata.doi ?? cleanDoi(input.identifier),
        abstract:
          metadata.abstract ??
          abstractSection?.paragraphs.map((p) => p.text).join("\n\n"),
        publisher: metadata.publisher ?? (publisher ? PUBLISHER_NAMES[publisher] : undefined),
        format,
        confidence: scoreConfidence(content, strategy.format, input.bytes.byteLength),
      },
    };
    this.log.debug(
      {
        identifier: input.identifier,
        sections: content.sections.length,
        paragraphs: content.paragraphs,
        confidence: document.metadata.confidence,
      },
      "parsed document",
    );
    return { status: "parsed", document };
  }
}
