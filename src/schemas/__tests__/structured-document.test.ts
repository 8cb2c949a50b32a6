import { describe, expect, test } from "vitest";
import { FetchOutcomeSchema } from "../fetch-outcome.js";
import { StructuredDocumentSchema } from "../structured-document.js";
import { IdentifierInputSchema } from "../work-identifier.js";

const document = {
  identifier: "10.1016/j.x.1",
  sections: [
    {
      title: "Introduction",
      order: 0,
      kind: "intro",
      paragraphs: [{ text: "First paragraph.", order: 0 }],
    },
  ],
  metadata: { authors: ["A. Author"], format: "html", confidence: 0.6 },
};

describe("StructuredDocumentSchema", () => {
  test("accepts a minimal document", () => {
    expect(StructuredDocumentSchema.parse(document)).toEqual(document);
  });

  test("rejects a whitespace-only paragraph", () => {
    const blank = {
      ...document,
      sections: [{ ...document.sections[0], paragraphs: [{ text: "  \n ", order: 0 }] }],
    };
    expect(StructuredDocumentSchema.safeParse(blank).success).toBe(false);
  });

  test("rejects an empty section", () => {
    const empty = { ...document, sections: [{ ...document.sections[0], paragraphs: [] }] };
    expect(StructuredDocumentSchema.safeParse(empty).success).toBe(false);
  });

  test("rejects a document without sections", () => {
    expect(StructuredDocumentSchema.safeParse({ ...document, sections: [] }).success).toBe(false);
  });

  test("confidence stays within 0..1", () => {
    const over = { ...document, metadata: { ...document.metadata, confidence: 1.2 } };
    expect(StructuredDocumentSchema.safeParse(over).success).toBe(false);
  });
});

describe("FetchOutcomeSchema", () => {
  test("accepts a partial outcome with its soft reason", () => {
    const partial = {
      status: "PARTIAL",
      artifact: { key: "10.1016/j.x.1", digest: "abc", size: 120 },
      format: "pdf",
      route: "manual",
      reason: "ARTIFACT_TRUNCATED",
      attempts: [{ route: "manual", result: "ARTIFACT_TRUNCATED", attempts: 1 }],
    };
    expect(FetchOutcomeSchema.parse(partial)).toEqual(partial);
  });

  test("a failed outcome carries no artifact", () => {
    const failed = {
      status: "FAILED",
      reason: "NOT_FOUND",
      attempts: [],
      artifact: { key: "k", digest: "d", size: 1 },
    };
    expect(FetchOutcomeSchema.safeParse(failed).success).toBe(false);
  });
});

describe("IdentifierInputSchema", () => {
  test("accepts bare and labelled identifiers", () => {
    const input = ["10.1016/j.x.1", { identifier: "10.1039/c0", batch: "rsc" }];
    expect(IdentifierInputSchema.parse(input)).toEqual(input);
  });

  test("rejects an empty identifier", () => {
    expect(IdentifierInputSchema.safeParse([""]).success).toBe(false);
  });
});
