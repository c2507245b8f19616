/**
 * @module pdf/pdf-text
 * @fileoverview Plain-text extraction from PDF bytes.
 *
 * Text is read page by page with pdfjs-dist's text layer, in content-stream
 * order. Items flagged `hasEOL` end a line; each page ends with a newline.
 * No OCR: a scanned PDF without a text layer yields empty text.
 */

import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { PdfExtractionError } from "../utils/errors.js";

/** Text of a PDF document. */
export interface PdfText {
  text: string;
  pageCount: number;
}

/** Extracts text from PDF bytes. */
export interface PdfTextExtractor {
  /**
   * @throws {PdfExtractionError} If the bytes are not a readable PDF.
   */
  extractText(data: Uint8Array): Promise<PdfText>;
}

/** {@link PdfTextExtractor} backed by pdfjs-dist. */
export class PdfJsTextExtractor implements PdfTextExtractor {
  async extractText(data: Uint8Array): Promise<PdfText> {
    // pdfjs detaches the buffer it is given, so hand it a copy.
    const task = getDocument({
      data: new Uint8Array(data),
      useSystemFonts: true,
      isEvalSupported: false,
    });

    try {
      const document = await task.promise;
      const pages: string[] = [];

      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const content = await page.getTextContent();
        let pageText = "";
        for (const item of content.items) {
          if (!("str" in item)) {
            continue;
          }
          pageText += item.str;
          if (item.hasEOL) {
            pageText += "\n";
          }
        }
        pages.push(pageText.endsWith("\n") ? pageText : `${pageText}\n`);
      }

      return { text: pages.join(""), pageCount: document.numPages };
    } catch (error: unknown) {
      throw new PdfExtractionError(
        `Could not read PDF: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      await task.destroy();
    }
  }
}
