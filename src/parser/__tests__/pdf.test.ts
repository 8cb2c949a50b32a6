import { describe, expect, test } from "vitest";
import { PdfStrategy } from "../pdf.js";

/** Minimal single-page PDF using the standard Helvetica font */
function buildPdf(lines: Array<{ text: string; size: number; y: number }>): Buffer {
  const stream = lines
    .map((l) => `BT /F1 ${l.size} Tf 72 ${l.y} Td (${l.text}) Tj ET`)
    .join("\n");
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>",
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
    `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    "<< /Title (Test Paper) /Author (Ada Lovelace; Alan Turing) /Subject (doi:10.1016/j.test.2020.1) >>",
  ];

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefAt = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 6 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return Buffer.from(body, "latin1");
}

describe("PdfStrategy", () => {
  test("reads headings and paragraphs from the text layer", async () => {
    const bytes = buildPdf([
      { text: "Introduction", size: 16, y: 720 },
      { text: "Electrodes were prepared from carbon.", size: 10, y: 700 },
      { text: "They were tested twice.", size: 10, y: 688 },
    ]);

    const { content, metadata } = await new PdfStrategy().extract({
      identifier: "10.1016/j.test.2020.1",
      bytes,
    });

    expect(content.sections.map((s) => [s.title, s.kind])).toEqual([
      ["Introduction", "intro"],
    ]);
    expect(content.sections[0].paragraphs).toEqual([
      { text: "Electrodes were prepared from carbon. They were tested twice.", order: 0 },
    ]);
    expect(metadata).toEqual({
      title: "Test Paper",
      authors: ["Ada Lovelace", "Alan Turing"],
      doi: "10.1016/j.test.2020.1",
    });
  });

  test("rejects bytes that are not a PDF", async () => {
    await expect(
      new PdfStrategy().extract({
        identifier: "x",
        bytes: Buffer.from("<html>not a pdf</html>"),
      }),
    ).rejects.toThrow();
  });
});
