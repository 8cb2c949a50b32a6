import * as cheerio from "cheerio";
import { type AnyNode, type Element, isTag, isText } from "domhandler";
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

// JATS and Elsevier full-text vocabularies, lowercased
const SECTION_TAGS = new Set([
  "sec",
  "abstract",
  "ack",
  "app",
  "ce:section",
  "ce:abstract",
  "ce:acknowledgment",
]);
const DEFAULT_SECTION_TITLES: Partial<Record<string, string>> = {
  abstract: "Abstract",
  "ce:abstract": "Abstract",
  ack: "Acknowledgements",
  "ce:acknowledgment": "Acknowledgements",
  app: "Appendix",
};
const TITLE_TAGS = new Set(["title", "ce:section-title"]);
const PARAGRAPH_TAGS = new Set(["p", "ce:para", "ce:simple-para"]);
const SKIP_TAGS = new Set([
  "ref-list",
  "ce:bibliography",
  "fig",
  "fig-group",
  "ce:figure",
  "table-wrap",
  "ce:table",
  "ce:floats",
  "ce:caption",
  "caption",
  "fn-group",
  "author-notes",
  "permissions",
  "ce:keywords",
  "kwd-group",
  "xocs:meta",
]);
const METADATA_TAGS = new Set([
  "dc:title",
  "article-title",
  "ce:title",
  "dc:creator",
  "contrib",
  "ce:author",
  "prism:publicationname",
  "journal-title",
  "prism:coverdate",
  "prism:coverdisplaydate",
  "pub-date",
  "prism:doi",
  "ce:doi",
  "article-id",
  "dc:description",
  "dc:publisher",
  "prism:publisher",
  "publisher-name",
]);

type TagIndex = Map<string, Element[]>;

function tagName(el: Element): string {
  return el.name.toLowerCase();
}

function textOf(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!isTag(node) || SKIP_TAGS.has(tagName(node))) return "";
  return node.children.map(textOf).join("");
}

function childTag(el: Element, names: ReadonlySet<string>): Element | undefined {
  return el.children.find(
    (child): child is Element => isTag(child) && names.has(tagName(child)),
  );
}

function descendant(el: Element, name: string): Element | undefined {
  for (const child of el.children) {
    if (!isTag(child)) continue;
    if (tagName(child) === name) return child;
    const found = descendant(child, name);
    if (found) return found;
  }
  return undefined;
}

function indexTags(nodes: AnyNode[], index: TagIndex = new Map()): TagIndex {
  for (const node of nodes) {
    if (!isTag(node)) continue;
    const name = tagName(node);
    if (METADATA_TAGS.has(name)) {
      const list = index.get(name) ?? [];
      list.push(node);
      index.set(name, list);
    }
    indexTags(node.children, index);
  }
  return index;
}

function texts(index: TagIndex, ...names: string[]): string[] {
  return names.flatMap((name) => (index.get(name) ?? []).map(textOf));
}

function personName(el: Element, given: string, surname: string): string {
  const first = descendant(el, given);
  const last = descendant(el, surname);
  if (!first && !last) return textOf(el);
  return [first, last]
    .map((part) => (part ? collapseWhitespace(textOf(part)) : ""))
    .filter((part) => part !== "")
    .join(" ");
}

function authorsOf(index: TagIndex): string[] {
  const jats = (index.get("contrib") ?? [])
    .filter((el) => (el.attribs["contrib-type"] ?? "author") === "author")
    .map((el) => personName(el, "given-names", "surname"));
  const elsevier = (index.get("ce:author") ?? []).map((el) =>
    personName(el, "ce:given-name", "ce:surname"),
  );
  return uniqueNames([...texts(index, "dc:creator"), ...jats, ...elsevier]);
}

function doiOf(index: TagIndex): string | undefined {
  const jats = (index.get("article-id") ?? [])
    .filter((el) => el.attribs["pub-id-type"] === "doi")
    .map(textOf);
  return [...texts(index, "prism:doi", "ce:doi"), ...jats]
    .map((value) => cleanDoi(value))
    .find((value) => value !== undefined);
}

/** JATS splits dates into day/month/year children */
function pubDates(index: TagIndex): string[] {
  return (index.get("pub-date") ?? []).map((el) => {
    const year = descendant(el, "year");
    return textOf(year ?? el);
  });
}

interface Frame {
  title?: string;
  parent?: string;
}

/**
 * JATS and Elsevier full-text XML. Nested sections are flattened in
 * document order; each keeps its enclosing section's title as parent.
 */
export class XmlStrategy implements ParseStrategy {
  readonly format = "xml";

  async extract(input: ParseInput): Promise<Extraction> {
    const $ = cheerio.load(Buffer.from(input.bytes).toString("utf8"), {
      xml: true,
    });
    const nodes = $.root().contents().toArray();
    const collector = new SectionCollector();
    this.walk(nodes, {}, collector);
    return { content: collector.build(), metadata: this.metadata(nodes) };
  }

  private walk(
    nodes: AnyNode[],
    frame: Frame,
    collector: SectionCollector,
  ): void {
    for (const node of nodes) {
      if (!isTag(node)) continue;
      const name = tagName(node);
      if (SKIP_TAGS.has(name) || TITLE_TAGS.has(name)) continue;

      if (PARAGRAPH_TAGS.has(name)) {
        collector.paragraph(collapseWhitespace(textOf(node)));
        continue;
      }

      if (!SECTION_TAGS.has(name)) {
        this.walk(node.children, frame, collector);
        continue;
      }

      // Graphical abstracts and highlights are not the author abstract
      const abstractClass = node.attribs.class;
      if (name === "ce:abstract" && abstractClass && abstractClass !== "author") {
        continue;
      }

      const titleTag = childTag(node, TITLE_TAGS);
      const title =
        firstText(titleTag ? textOf(titleTag) : undefined) ??
        DEFAULT_SECTION_TITLES[name];
      if (title === undefined) {
        this.walk(node.children, frame, collector);
        continue;
      }
      collector.heading(title, frame.title);
      this.walk(node.children, { title, parent: frame.title }, collector);
      collector.resume(frame.title, frame.parent);
    }
  }

  private metadata(nodes: AnyNode[]): ExtractedMetadata {
    const index = indexTags(nodes);
    return {
      title: firstText(...texts(index, "dc:title", "article-title", "ce:title")),
      authors: authorsOf(index),
      venue: firstText(...texts(index, "prism:publicationname", "journal-title")),
      year: [...texts(index, "prism:coverdate", "prism:coverdisplaydate"), ...pubDates(index)]
        .map((value) => parseYear(value))
        .find((value) => value !== undefined),
      doi: doiOf(index),
      abstract: firstText(...texts(index, "dc:description")),
      publisher: firstText(
        ...texts(index, "dc:publisher", "prism:publisher", "publisher-name"),
      ),
    };
  }
}
