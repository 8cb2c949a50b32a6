import { describe, expect, test } from "vitest";
import { detectFormat, isTruncated } from "../format.js";

const bytes = (text: string) => Buffer.from(text, "latin1");

describe("detectFormat", () => {
  test("recognizes PDF magic bytes regardless of content type", () => {
    expect(detectFormat(bytes("%PDF-1.7\n..."), "text/html")).toBe("pdf");
  });

  test("XML prolog is xml unless the document is XHTML", () => {
    expect(detectFormat(bytes('<?xml version="1.0"?><article/>'))).toBe("xml");
    expect(
      detectFormat(bytes('<?xml version="1.0"?>\n<html xmlns="http://www.w3.org/1999/xhtml">')),
    ).toBe("html");
  });

  test("doctype and html root are html", () => {
    expect(detectFormat(bytes("  <!DOCTYPE html><html></html>"))).toBe("html");
    expect(detectFormat(bytes("<HTML><body></body></HTML>"))).toBe("html");
  });

  test("known XML roots without a prolog are xml", () => {
    expect(detectFormat(bytes("<full-text-retrieval-response>"))).toBe("xml");
    expect(detectFormat(bytes("<article article-type=\"research\">"))).toBe("xml");
  });

  test("strips a UTF-8 byte order mark", () => {
    const withBom = Buffer.concat([
      Buffer.from([0xef, 0xbb, 0xbf]),
      bytes("<!doctype html>"),
    ]);
    expect(detectFormat(withBom)).toBe("html");
  });

  test("falls back to content type, then unknown", () => {
    expect(detectFormat(bytes("plain words"), "application/pdf")).toBe("pdf");
    expect(detectFormat(bytes("plain words"), "text/html; charset=utf-8")).toBe(
      "html",
    );
    expect(detectFormat(bytes("plain words"), "application/jats+xml")).toBe("xml");
    expect(detectFormat(bytes("plain words"), "text/plain")).toBe("unknown");
    expect(detectFormat(bytes("plain words"))).toBe("unknown");
  });
});

describe("isTruncated", () => {
  test("fewer bytes than declared is truncated", () => {
    expect(isTruncated(bytes("<article/>"), "xml", 500)).toBe(true);
    expect(isTruncated(bytes("<article/>"), "xml", 10)).toBe(false);
  });

  test("PDF without an end-of-file marker is truncated", () => {
    expect(isTruncated(bytes("%PDF-1.4\nobj\n%%EOF\n"), "pdf")).toBe(false);
    expect(isTruncated(bytes("%PDF-1.4\nobj\n"), "pdf")).toBe(true);
  });

  test("HTML that opens but never closes its root is truncated", () => {
    expect(isTruncated(bytes("<html><body><p>cut"), "html")).toBe(true);
    expect(isTruncated(bytes("<html><body></body></html>"), "html")).toBe(false);
    expect(isTruncated(bytes("<p>fragment</p>"), "html")).toBe(false);
  });
});
