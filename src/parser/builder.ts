import type { Section } from "../schemas/index.js";
import { classifySection } from "./classify.js";
import { collapseWhitespace, splitParagraphs } from "./text.js";

/** Title given to paragraphs that appear before any heading */
export const BODY_TITLE = "Body";

interface DraftSection {
  title: string;
  parent?: string;
  synthetic: boolean;
  paragraphs: string[];
}

export interface BuiltContent {
  sections: Section[];
  headings: number; // sections that came from a real heading
  paragraphs: number;
  textChars: number;
}

/**
 * Accumulates headings and paragraphs in source order and turns them into
 * numbered, classified sections. Shared by every parse strategy.
 */
export class SectionCollector {
  private readonly drafts: DraftSection[] = [];
  private current: DraftSection | undefined;

  constructor(private readonly minParagraphChars = 0) {}

  heading(title: string, parent?: string): void {
    const clean = collapseWhitespace(title);
    if (clean === "") return;
    const cleanParent = parent ? collapseWhitespace(parent) : undefined;
    this.open({ title: clean, parent: cleanParent, synthetic: false, paragraphs: [] });
  }

  /** Text may hold several blank-line separated paragraphs. */
  paragraph(text: string): void {
    for (const paragraph of splitParagraphs(text)) {
      if (paragraph.length < this.minParagraphChars) continue;
      if (!this.current) {
        this.open({ title: BODY_TITLE, synthetic: true, paragraphs: [] });
      }
      this.current?.paragraphs.push(paragraph);
    }
  }

  /**
   * Reopen an enclosing section once a nested one has ended, so trailing
   * paragraphs land under the right title. Unused continuations are dropped.
   */
  resume(title: string | undefined, parent?: string): void {
    if (title === undefined) {
      this.current = undefined;
      return;
    }
    this.open({ title, parent, synthetic: true, paragraphs: [] });
  }

  build(): BuiltContent {
    const kept = this.drafts.filter((draft) => draft.paragraphs.length > 0);
    const sections = kept.map((draft, order) => ({
      title: draft.title,
      order,
      kind: classifySection(draft.title, draft.parent),
      paragraphs: draft.paragraphs.map((text, index) => ({ text, order: index })),
    }));
    return {
      sections,
      headings: kept.filter((draft) => !draft.synthetic).length,
      paragraphs: kept.reduce((sum, draft) => sum + draft.paragraphs.length, 0),
      textChars: kept.reduce(
        (sum, draft) =>
          sum + draft.paragraphs.reduce((n, text) => n + text.length, 0),
        0,
      ),
    };
  }

  private open(draft: DraftSection): void {
    this.drafts.push(draft);
    this.current = draft;
  }
}
