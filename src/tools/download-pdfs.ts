/**
 * @module tools/download-pdfs
 * @fileoverview MCP Tool: download_pdfs -- fetch recorded PDFs and extract their text.
 */

import { z } from "zod";
import { config } from "../config.js";
import { PdfDownloader } from "../pdf/downloader.js";
import { PdfJsTextExtractor } from "../pdf/pdf-text.js";
import { defaultTokenizer } from "../text/tokenizer.js";
import { errorResult, textResult, type ToolResult } from "./response.js";

export const DownloadPdfsSchema = {
  links_file: z
    .string()
    .optional()
    .describe(`PDF links JSON-lines file to read (default: ${config.pdfLinksFile})`),

  output_file: z
    .string()
    .optional()
    .describe(`Raw-text JSON-lines file to write (default: ${config.rawTextFile})`),
};

interface DownloadPdfsParams {
  links_file?: string;
  output_file?: string;
}

export async function handleDownloadPdfs(params: DownloadPdfsParams): Promise<ToolResult> {
  try {
    const outputFile = params.output_file ?? config.rawTextFile;
    const downloader = new PdfDownloader({
      linksFile: params.links_file ?? config.pdfLinksFile,
      outputFile,
      downloadDir: config.downloadDir,
      cacheKey: config.pdfCacheKey,
      extractor: new PdfJsTextExtractor(),
      tokenizer: defaultTokenizer(),
    });

    const summary = await downloader.run();
    return textResult(
      [
        `# PDF Download Results`,
        `> PDFs listed: ${summary.total}`,
        `> Extracted: ${summary.written} (${summary.cached} from cache)`,
        `> Failed: ${summary.failed}`,
        `> Skipped lines: ${summary.skipped}`,
        `> Output: ${outputFile}`,
      ].join("\n"),
    );
  } catch (error) {
    return errorResult(error);
  }
}
