/**
 * @fileoverview Tests for pdfjs-backed text extraction.
 *
 * The sample document is assembled in memory with correct xref offsets, one
 * page per entry of `pageTexts`.
 */

import { describe, it, expect } from "vitest";
import { PdfJsTextExtractor } from "../../src/pdf/pdf-text.js";
import { PdfExtractionError } from "../../src/utils/errors.js";

function buildPdf(pageTexts: string[]): Uint8Array {
  const pageCount = pageTexts.length;
  const fontId = 3 + pageCount * 2;
  const objects: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageTexts.map((_t, i) => `${3 + i * 2} 0 R`).join(" ")}] /Count ${pageCount} >>`,
  ];
  pageTexts.forEach((text, i) => {
    const stream = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents ${4 + i * 2} 0 R /Resources << /Font << /F1 ${fontId} 0 R >> >> >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    );
  });
  objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>");

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(body);
}

describe("PdfJsTextExtractor", () => {
  const extractor = new PdfJsTextExtractor();

  it("extracts the text of every page in order", async () => {
    const result = await extractor.extractText(buildPdf(["Hello PDF", "Second page"]));

    expect(result.pageCount).toBe(2);
    const lines = result.text.split("\n").filter((line) => line.trim().length > 0);
    expect(lines).toEqual(["Hello PDF", "Second page"]);
    expect(result.text.endsWith("\n")).toBe(true);
  });

  it("leaves the caller's buffer usable", async () => {
    const data = buildPdf(["Reusable"]);
    await extractor.extractText(data);

    expect(data.byteLength).toBeGreaterThan(0);
    await expect(extractor.extractText(data)).resolves.toMatchObject({ pageCount: 1 });
  });

  it("wraps unreadable input in PdfExtractionError", async () => {
    const data = new TextEncoder().encode("this is not a pdf");

    await expect(extractor.extractText(data)).rejects.toBeInstanceOf(PdfExtractionError);
  });
});
