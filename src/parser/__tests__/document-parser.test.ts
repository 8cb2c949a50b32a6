import { readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StructuredDocumentSchema } from "../../schemas/index.js";
import { SqliteScratchStore } from "../../scratch/index.js";
import { DocumentParser } from "../document-parser.js";
import type { ParseStrategy } from "../strategy.js";

const D1 = readFileSync(new URL("./fixtures/d1-article.html", import.meta.url));
const JATS = readFileSync(new URL("./fixtures/jats-article.xml", import.meta.url));

describe("DocumentParser", () => {
  let scratch: SqliteScratchStore;
  let parser: DocumentParser;

  beforeEach(() => {
    scratch = new SqliteScratchStore({ dbPath: ":memory:" });
    parser = new DocumentParser({ scratch });
  });

  afterEach(() => {
    scratch.close();
  });

  const stash = (identifier: string, bytes: Buffer, format: "html" | "xml" | "pdf") =>
    scratch.put({ key: identifier.toLowerCase(), identifier, format, bytes });

  test("parses a stored HTML artifact into a valid document", async () => {
    const ref = await stash("10.1016/j.carbon.2021.01.001", D1, "html");

    const result = await parser.parse(ref, "html");

    expect(result.status).toBe("parsed");
    if (result.status !== "parsed") return;
    const { document } = result;
    expect(StructuredDocumentSchema.safeParse(document).success).toBe(true);
    expect(document.identifier).toBe("10.1016/j.carbon.2021.01.001");
    expect(document.sections).toHaveLength(3);
    expect(document.sections.flatMap((s) => s.paragraphs)).toHaveLength(12);
    expect(document.metadata.format).toBe("html");
    expect(document.metadata.publisher).toBe("Elsevier");
    expect(document.metadata.confidence).toBeGreaterThan(0);
    expect(document.metadata.confidence).toBeLessThanOrEqual(1);
  });

  test("fills abstract from the abstract section and doi from the identifier", async () => {
    const ref = await stash("10.1007/S10000-020-0001-2", JATS, "xml");
    const result = await parser.parse(ref, "xml");

    expect(result.status === "parsed" && result.document.metadata).toMatchObject({
      abstract: "We report cathodes.",
      doi: "10.1007/s10000-020-0001-2",
      publisher: "Springer",
      format: "xml",
    });
  });

  test("doi falls back to the identifier when the artifact has none", async () => {
    const ref = await stash(
      "10.1002/anie.202000001",
      Buffer.from("<html><body><p>Only text.</p></body></html>"),
      "html",
    );
    const result = await parser.parse(ref, "html");
    expect(result.status === "parsed" && result.document.metadata.doi).toBe(
      "10.1002/anie.202000001",
    );
  });

  test("unknown format is UNSUPPORTED_FORMAT", async () => {
    const ref = await stash("x", Buffer.from("plain"), "html");
    const result = await parser.parse(ref, "unknown");
    expect(result).toEqual({
      status: "failed",
      failure: {
        code: "UNSUPPORTED_FORMAT",
        message: 'no parse strategy for format "unknown"',
      },
    });
  });

  test("a format with no registered strategy is UNSUPPORTED_FORMAT", async () => {
    const htmlOnly = new DocumentParser({
      scratch,
      strategies: [],
    });
    const ref = await stash("x", D1, "html");
    const result = await htmlOnly.parse(ref, "html");
    expect(result.status === "failed" && result.failure.code).toBe("UNSUPPORTED_FORMAT");
  });

  test("page chrome without body text is EMPTY_CONTENT", async () => {
    const ref = await stash(
      "x",
      Buffer.from("<html><body><nav>Menu</nav><footer>Footer</footer></body></html>"),
      "html",
    );
    const result = await parser.parse(ref, "html");
    expect(result).toEqual({
      status: "failed",
      failure: {
        code: "EMPTY_CONTENT",
        message: "no paragraphs extracted from html artifact",
      },
    });
  });

  test("a strategy that throws yields MALFORMED_ARTIFACT", async () => {
    const broken: ParseStrategy = {
      format: "pdf",
      async extract() {
        throw new Error("bad xref table");
      },
    };
    parser.register(broken);
    const ref = await stash("x", Buffer.from("%PDF-1.4"), "pdf");

    const result = await parser.parse(ref, "pdf");

    expect(result).toEqual({
      status: "failed",
      failure: {
        code: "MALFORMED_ARTIFACT",
        message: "pdf artifact could not be read: bad xref table",
      },
    });
  });

  test("missing or replaced scratch artifacts are ARTIFACT_MISSING", async () => {
    const ref = await stash("x", D1, "html");

    const stale = await parser.parse({ ...ref, digest: "0".repeat(64) }, "html");
    expect(stale.status === "failed" && stale.failure).toEqual({
      code: "ARTIFACT_MISSING",
      message: "scratch artifact for x changed since it was fetched",
    });

    await scratch.delete("x");
    const gone = await parser.parse(ref, "html");
    expect(gone.status === "failed" && gone.failure).toEqual({
      code: "ARTIFACT_MISSING",
      message: "no scratch artifact for x",
    });
  });

  test("never mutates or depends on a previous parse", async () => {
    const ref = await stash("10.1016/j.carbon.2021.01.001", D1, "html");
    const first = await parser.parse(ref, "html");
    const second = await parser.parse(ref, "html");
    expect(second).toEqual(first);
  });
});
