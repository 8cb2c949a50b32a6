import type { DetectedFormat } from "../schemas/index.js";

const SNIFF_BYTES = 2048;
const PDF_TRAILER_WINDOW = 1024;

const XML_ROOTS = ["<article", "<full-text-retrieval-response", "<pmc-articleset"];

function head(bytes: Uint8Array, length = SNIFF_BYTES): string {
  return Buffer.from(bytes.subarray(0, length))
    .toString("latin1")
    .replace(/^\xEF\xBB\xBF/, "")
    .trimStart()
    .toLowerCase();
}

function fromContentType(contentType: string | undefined): DetectedFormat {
  const type = contentType?.split(";")[0]?.trim().toLowerCase();
  if (!type) return "unknown";
  if (type === "application/pdf") return "pdf";
  if (type === "text/html" || type === "application/xhtml+xml") return "html";
  if (type.endsWith("/xml") || type.endsWith("+xml")) return "xml";
  return "unknown";
}

/**
 * Identify an artifact's format from its leading bytes, falling back to
 * the declared content type.
 */
export function detectFormat(
  bytes: Uint8Array,
  contentType?: string,
): DetectedFormat {
  const start = head(bytes);
  if (start.startsWith("%pdf-")) return "pdf";
  if (start.startsWith("<?xml")) {
    return start.includes("<!doctype html") ||
      start.includes("<html") ||
      start.includes("xhtml")
      ? "html"
      : "xml";
  }
  if (start.startsWith("<!doctype html") || start.startsWith("<html")) {
    return "html";
  }
  if (XML_ROOTS.some((root) => start.startsWith(root))) return "xml";
  return fromContentType(contentType);
}

/**
 * True when the body is visibly cut short: fewer bytes than the server
 * declared, a PDF with no end-of-file marker, or an HTML page that never
 * closes its root element.
 */
export function isTruncated(
  bytes: Uint8Array,
  format: DetectedFormat,
  declaredLength?: number,
): boolean {
  if (declaredLength !== undefined && declaredLength > bytes.byteLength) {
    return true;
  }
  if (format === "pdf") {
    const tail = Buffer.from(
      bytes.subarray(Math.max(0, bytes.byteLength - PDF_TRAILER_WINDOW)),
    ).toString("latin1");
    return !tail.includes("%%EOF");
  }
  if (format === "html") {
    const text = Buffer.from(bytes).toString("latin1").toLowerCase();
    return text.includes("<html") && !text.includes("</html>");
  }
  return false;
}
