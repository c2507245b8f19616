/**
 * @fileoverview Tests for link extraction and PDF/page partitioning.
 *
 * Covers: extractLinks for finding, categorising and skipping anchors.
 * Also covers: partitionLinks for resolution, normalization, dedup and the
 * PDF/page split.
 *
 * extractLinks keeps hrefs as written; resolution against the page URL is
 * partitionLinks' job, so the two are tested separately.
 */

import { describe, it, expect } from "vitest";
import { extractLinks, partitionLinks } from "../../src/crawler/link-resolver.js";

// ---------------------------------------------------------------------------
// extractLinks: basic extraction
// ---------------------------------------------------------------------------

describe("extractLinks: basic link discovery", () => {
  it("keeps relative hrefs unresolved and classifies them as internal", () => {
    const html = `
      <html><body>
        <a href="/about">About Us</a>
        <a href="../blog">Blog</a>
      </body></html>
    `;
    const links = extractLinks(html, "https://example.com/docs/intro");

    expect(links.internal).toEqual([
      { href: "/about", text: "About Us" },
      { href: "../blog", text: "Blog" },
    ]);
    expect(links.external).toEqual([]);
  });

  it("classifies absolute links to other hosts as external", () => {
    const html = `
      <a href="https://example.com/same">Same</a>
      <a href="https://other.org/page">Other</a>
      <a href="https://sub.example.com/x">Sub</a>
    `;
    const links = extractLinks(html, "https://example.com/");

    expect(links.internal.map((l) => l.href)).toEqual(["https://example.com/same"]);
    expect(links.external.map((l) => l.href)).toEqual([
      "https://other.org/page",
      "https://sub.example.com/x",
    ]);
  });

  it("collapses whitespace in anchor text and trims the href", () => {
    const html = `<a href="  /spaced  ">
        Read
          more
      </a>`;
    const links = extractLinks(html, "https://example.com/");

    expect(links.internal).toEqual([{ href: "/spaced", text: "Read more" }]);
  });

  it("keeps duplicate anchors in document order", () => {
    const html = `<a href="/a">one</a><a href="/a">two</a>`;
    const links = extractLinks(html, "https://example.com/");

    expect(links.internal.map((l) => l.text)).toEqual(["one", "two"]);
  });
});

// ---------------------------------------------------------------------------
// extractLinks: skipped anchors
// ---------------------------------------------------------------------------

describe("extractLinks: skipped anchors", () => {
  it("skips empty, fragment-only and non-fetchable hrefs", () => {
    const html = `
      <a href="">empty</a>
      <a href="   ">blank</a>
      <a href="#top">top</a>
      <a href="mailto:someone@example.com">mail</a>
      <a href="JavaScript:void(0)">js</a>
      <a href="tel:+100">call</a>
      <a href="data:text/plain,hi">data</a>
      <a href="/kept">kept</a>
    `;
    const links = extractLinks(html, "https://example.com/");

    expect(links.internal).toEqual([{ href: "/kept", text: "kept" }]);
    expect(links.external).toEqual([]);
  });

  it("ignores anchors without an href attribute", () => {
    const links = extractLinks(`<a name="anchor">x</a>`, "https://example.com/");
    expect(links).toEqual({ internal: [], external: [] });
  });

  it("skips hrefs that do not resolve", () => {
    const links = extractLinks(`<a href="http://[bad">x</a>`, "https://example.com/");
    expect(links).toEqual({ internal: [], external: [] });
  });
});

// ---------------------------------------------------------------------------
// partitionLinks
// ---------------------------------------------------------------------------

describe("partitionLinks", () => {
  it("resolves relative hrefs and strips fragments", () => {
    const result = partitionLinks("https://a.com/docs/intro", [
      "../files/A.PDF#p2",
      "next#section",
    ]);

    expect(result).toEqual({
      pdfs: ["https://a.com/files/A.PDF"],
      pages: ["https://a.com/docs/next"],
    });
  });

  it("deduplicates after normalization and keeps first-seen order", () => {
    const result = partitionLinks("https://a.com/", [
      "/b",
      "/a.pdf",
      "/b#x",
      "/c",
      "/a.pdf#page=3",
    ]);

    expect(result.pages).toEqual(["https://a.com/b", "https://a.com/c"]);
    expect(result.pdfs).toEqual(["https://a.com/a.pdf"]);
  });

  it("drops non-crawlable targets that are not PDFs", () => {
    const result = partitionLinks("https://a.com/", [
      "/archive.zip",
      "/setup.EXE",
      "ftp://a.com/file",
      "mailto:x@a.com",
    ]);

    expect(result).toEqual({ pdfs: [], pages: [] });
  });

  it("treats a .pdf in the query string as a page, not a PDF", () => {
    const result = partitionLinks("https://a.com/", ["/view?file=report.pdf"]);

    expect(result).toEqual({ pdfs: [], pages: ["https://a.com/view?file=report.pdf"] });
  });

  it("keeps a self link as a page target", () => {
    const result = partitionLinks("https://a.com/x", ["https://a.com/x"]);
    expect(result.pages).toEqual(["https://a.com/x"]);
  });

  it("skips hrefs that fail to resolve", () => {
    const result = partitionLinks("https://a.com/", ["http://[bad", "/ok"]);
    expect(result.pages).toEqual(["https://a.com/ok"]);
  });
});
