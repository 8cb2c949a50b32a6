import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { identifyPublisher } from "../resolver/index.js";
import { SectionCollector } from "./builder.js";
import {
  type ExtractedMetadata,
  cleanDoi,
  firstText,
  parseYear,
  uniqueNames,
} from "./metadata.js";
import type { Extraction, ParseInput, ParseStrategy } from "./strategy.js";
import { collapseWhitespace } from "./text.js";

const NOISE_SELECTORS = [
  "script",
  "style",
  "noscript",
  "nav",
  "header",
  "footer",
  "aside",
  "form",
  "table",
  "figure",
  "figcaption",
  "code",
  "references",
  "ref-list",
  ".references",
  "#references",
  ".ref-list",
  "section.bibliography",
  '[role="navigation"]',
  "p.header_text",
];

/** RSC pages pad articles with short caption and label paragraphs */
const RSC_MIN_PARAGRAPH_CHARS = 21;

const META = {
  title: ["citation_title", "dc.title", "og:title"],
  authors: ["citation_author", "dc.creator"],
  venue: [
    "citation_journal_title",
    "prism.publicationname",
    "citation_conference_title",
  ],
  date: [
    "citation_publication_date",
    "citation_date",
    "dc.date",
    "prism.publicationdate",
    "prism.coverdate",
    "citation_online_date",
  ],
  doi: ["citation_doi", "prism.doi", "dc.identifier"],
  abstract: ["citation_abstract", "dc.description", "description", "og:description"],
  publisher: ["citation_publisher", "dc.publisher"],
} as const;

type MetaIndex = Map<string, string[]>;

function indexMeta($: CheerioAPI): MetaIndex {
  const index: MetaIndex = new Map();
  $("meta").each((_, el) => {
    const node = $(el);
    const name = (node.attr("name") ?? node.attr("property"))?.toLowerCase();
    const content = node.attr("content");
    if (!name || content === undefined) return;
    const values = index.get(name) ?? [];
    values.push(content);
    index.set(name, values);
  });
  return index;
}

function metaValues(index: MetaIndex, names: readonly string[]): string[] {
  return names.flatMap((name) => index.get(name) ?? []);
}

export interface HtmlStrategyOptions {
  /** Drop paragraphs shorter than this; defaults per publisher */
  minParagraphChars?: number;
}

export class HtmlStrategy implements ParseStrategy {
  readonly format = "html";

  constructor(private readonly options: HtmlStrategyOptions = {}) {}

  async extract(input: ParseInput): Promise<Extraction> {
    const $ = cheerio.load(Buffer.from(input.bytes).toString("utf8"));
    const metadata = this.extractMetadata($);

    for (const selector of NOISE_SELECTORS) {
      $(selector).remove();
    }

    let root = $("article").first();
    if (root.length === 0) root = $("main").first();
    if (root.length === 0) root = $("body");

    const collector = new SectionCollector(this.minParagraphChars(input.identifier));
    if (root.find("p").length === 0) {
      collector.paragraph(root.text());
      return { content: collector.build(), metadata };
    }

    const title = metadata.title?.toLowerCase();
    const levels: Array<string | undefined> = [];
    root.find("h1, h2, h3, h4, p").each((_, el) => {
      const text = collapseWhitespace($(el).text());
      const tag = el.tagName.toLowerCase();
      if (tag === "p") {
        collector.paragraph(text);
        return;
      }
      const level = Number(tag.slice(1));
      // The article's own title is not a section
      if (level === 1 && text.toLowerCase() === title) return;
      levels.length = level - 1;
      const parent = [...levels].reverse().find((t) => t !== undefined);
      levels[level - 1] = text;
      collector.heading(text, parent);
    });

    return { content: collector.build(), metadata };
  }

  private minParagraphChars(identifier: string): number {
    if (this.options.minParagraphChars !== undefined) {
      return this.options.minParagraphChars;
    }
    return identifyPublisher(identifier) === "rsc" ? RSC_MIN_PARAGRAPH_CHARS : 0;
  }

  private extractMetadata($: CheerioAPI): ExtractedMetadata {
    const meta = indexMeta($);
    const doi = metaValues(meta, META.doi)
      .map((value) => cleanDoi(value))
      .find((value) => value !== undefined);
    const year = metaValues(meta, META.date)
      .map((value) => parseYear(value))
      .find((value) => value !== undefined);

    return {
      title: firstText(
        ...metaValues(meta, META.title),
        $("title").first().text(),
      ),
      authors: uniqueNames(metaValues(meta, META.authors)),
      venue: firstText(...metaValues(meta, META.venue)),
      year,
      doi,
      abstract: firstText(...metaValues(meta, META.abstract)),
      publisher: firstText(...metaValues(meta, META.publisher)),
    };
  }
}
