/**
 * @fileoverview Tests for the PDF download stage.
 *
 * Downloads are stubbed and the extractor decodes bytes as UTF-8, so the
 * "PDF" content is just text. Files live in a fresh temp directory per test.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PdfDownloader, cacheFileName } from "../../src/pdf/downloader.js";
import type { PdfText, PdfTextExtractor } from "../../src/pdf/pdf-text.js";
import { TextRecordSchema } from "../../src/records.js";
import { PdfExtractionError } from "../../src/utils/errors.js";
import { contentHash } from "../../src/utils/hash.js";
import { readJsonl } from "../../src/utils/jsonl.js";
import { WhitespaceTokenizer } from "../fakes/whitespace-tokenizer.js";

class Utf8Extractor implements PdfTextExtractor {
  async extractText(data: Uint8Array): Promise<PdfText> {
    const text = new TextDecoder().decode(data);
    if (text.startsWith("corrupt")) {
      throw new PdfExtractionError("Could not read PDF: bad header");
    }
    return { text, pageCount: 1 };
  }
}

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "downloader-test-"));
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

function links(...urls: string[]): string {
  return urls
    .map((url) => JSON.stringify({ pdf_url: url, source_page: "https://a.com/" }))
    .join("\n");
}

function createDownloader(
  download: (url: string) => Promise<Uint8Array>,
  cacheKey: "url-hash" | "basename" = "url-hash",
) {
  return new PdfDownloader({
    linksFile: path.join(dir, "pdf_links.jsonl"),
    outputFile: path.join(dir, "out", "raw_text.jsonl"),
    downloadDir: path.join(dir, "downloads"),
    cacheKey,
    extractor: new Utf8Extractor(),
    tokenizer: new WhitespaceTokenizer(),
    download,
  });
}

async function readOutput() {
  return readJsonl(path.join(dir, "out", "raw_text.jsonl"), TextRecordSchema);
}

const encode = (text: string) => new TextEncoder().encode(text);

// ---------------------------------------------------------------------------
// cacheFileName
// ---------------------------------------------------------------------------

describe("cacheFileName", () => {
  it("uses the decoded basename in basename mode", () => {
    expect(cacheFileName("https://a.com/x/Annual%20Report.pdf", "basename")).toBe(
      "Annual Report.pdf",
    );
  });

  it("prefixes the URL hash in url-hash mode", () => {
    const url = "https://a.com/x/report.pdf";
    expect(cacheFileName(url, "url-hash")).toBe(`${contentHash(url)}-report.pdf`);
  });

  it("gives distinct URLs with the same basename distinct url-hash names", () => {
    const first = cacheFileName("https://a.com/one/report.pdf", "url-hash");
    const second = cacheFileName("https://a.com/two/report.pdf", "url-hash");
    expect(first).not.toBe(second);
  });

  it("replaces separators that appear after decoding", () => {
    expect(cacheFileName("https://a.com/a%2Fb.pdf", "basename")).toBe("a_b.pdf");
  });
});

// ---------------------------------------------------------------------------
// PdfDownloader.run
// ---------------------------------------------------------------------------

describe("PdfDownloader.run", () => {
  it("writes one raw-text record per PDF", async () => {
    await fs.writeFile(
      path.join(dir, "pdf_links.jsonl"),
      links("https://a.com/docs/guide.pdf", "https://b.org/Spec%20Sheet.pdf"),
    );
    const downloader = createDownloader(async (url) => encode(`text of ${url}`));

    const summary = await downloader.run();

    expect(summary).toEqual({ total: 2, written: 2, cached: 0, failed: 0, skipped: 0 });
    const records = await readOutput();
    expect(records.map(({ url, title, text, tokens }) => ({ url, title, text, tokens }))).toEqual([
      {
        url: "https://a.com/docs/guide.pdf",
        title: "guide.pdf",
        text: "text of https://a.com/docs/guide.pdf",
        tokens: 3,
      },
      {
        url: "https://b.org/Spec%20Sheet.pdf",
        title: "Spec Sheet.pdf",
        text: "text of https://b.org/Spec%20Sheet.pdf",
        tokens: 3,
      },
    ]);
    expect(records[0].id).not.toBe(records[1].id);
  });

  it("stores downloads in the cache and reuses them on the next run", async () => {
    const url = "https://a.com/cached.pdf";
    await fs.writeFile(path.join(dir, "pdf_links.jsonl"), links(url));
    const download = vi.fn(async () => encode("cached body"));
    const downloader = createDownloader(download);

    await downloader.run();
    const second = await downloader.run();

    expect(download).toHaveBeenCalledTimes(1);
    expect(second).toMatchObject({ written: 1, cached: 1 });
    await expect(fs.readFile(downloader.cachePath(url), "utf8")).resolves.toBe("cached body");
    expect(await readOutput()).toHaveLength(1);
  });

  it("skips repeated URLs and invalid lines", async () => {
    await fs.writeFile(
      path.join(dir, "pdf_links.jsonl"),
      [
        links("https://a.com/a.pdf"),
        "{broken",
        JSON.stringify({ source_page: "https://a.com/" }),
        links("https://a.com/a.pdf"),
      ].join("\n"),
    );
    const download = vi.fn(async () => encode("body"));

    const summary = await createDownloader(download).run();

    expect(summary).toEqual({ total: 1, written: 1, cached: 0, failed: 0, skipped: 3 });
    expect(download).toHaveBeenCalledTimes(1);
  });

  it("logs a failing URL and continues with the rest", async () => {
    await fs.writeFile(
      path.join(dir, "pdf_links.jsonl"),
      links("https://a.com/bad.pdf", "https://a.com/corrupt.pdf", "https://a.com/good.pdf"),
    );
    const downloader = createDownloader(async (url) => {
      if (url.endsWith("bad.pdf")) {
        throw new Error("HTTP 500");
      }
      return encode(url.endsWith("corrupt.pdf") ? "corrupt bytes" : "fine");
    });

    const summary = await downloader.run();

    expect(summary).toMatchObject({ total: 3, written: 1, failed: 2 });
    expect((await readOutput()).map((r) => r.url)).toEqual(["https://a.com/good.pdf"]);
    expect(console.error).toHaveBeenCalledWith(
      "[pdf-downloader] Failed processing https://a.com/bad.pdf: HTTP 500",
    );
    expect(console.error).toHaveBeenCalledWith(
      "[pdf-downloader] Failed processing https://a.com/corrupt.pdf: [PDF_EXTRACTION_FAILED] Could not read PDF: bad header",
    );
  });

  it("truncates the output from a previous run", async () => {
    const output = path.join(dir, "out", "raw_text.jsonl");
    await fs.mkdir(path.dirname(output), { recursive: true });
    await fs.writeFile(output, '{"stale":true}\n');
    await fs.writeFile(path.join(dir, "pdf_links.jsonl"), links("https://a.com/new.pdf"));

    await createDownloader(async () => encode("fresh")).run();

    const records = await readOutput();
    expect(records.map((r) => r.text)).toEqual(["fresh"]);
  });

  it("returns an empty summary when the links file is missing", async () => {
    const download = vi.fn(async () => encode(""));

    const summary = await createDownloader(download).run();

    expect(summary).toEqual({ total: 0, written: 0, cached: 0, failed: 0, skipped: 0 });
    expect(download).not.toHaveBeenCalled();
    await expect(fs.access(path.join(dir, "out", "raw_text.jsonl"))).rejects.toThrow();
    expect(console.error).toHaveBeenCalledWith(
      `[pdf-downloader] WARNING: ${path.join(dir, "pdf_links.jsonl")} not found. Skipping download.`,
    );
  });

  it("shares one cache entry between same-named URLs in basename mode", async () => {
    await fs.writeFile(
      path.join(dir, "pdf_links.jsonl"),
      links("https://a.com/one/report.pdf", "https://a.com/two/report.pdf"),
    );
    const download = vi.fn(async (url: string) => encode(url));

    const summary = await createDownloader(download, "basename").run();

    expect(download).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ written: 2, cached: 1 });
    expect((await readOutput()).map((r) => r.text)).toEqual([
      "https://a.com/one/report.pdf",
      "https://a.com/one/report.pdf",
    ]);
  });
});
