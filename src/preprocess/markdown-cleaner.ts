/**
 * @module preprocess/markdown-cleaner
 * @fileoverview Markdown cleanup and heading-based sectioning.
 *
 * Cleaning removes what an extraction model cannot use (images, link targets,
 * emphasis and code markers) but keeps each ATX heading's leading `#` run,
 * which {@link extractSections} splits on.
 *
 * @example
 * ```ts
 * const md = "Intro text\n\n## Setup\nRun [the script](https://a.com/s.sh).";
 * extractSections(cleanMarkdown(md));
 * // => [
 * //   { heading: "General", lines: ["Intro text"] },
 * //   { heading: "Setup", lines: ["Run the script."] },
 * // ]
 * ```
 */

/** Title of the section holding text that precedes the first heading. */
export const DEFAULT_SECTION_HEADING = "General";

export interface Section {
  heading: string;

  /** Trimmed, non-empty content lines, in order. */
  lines: string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Cleaning
 * ──────────────────────────────────────────────────────────────────────────── */

const IMAGE_REGEX = /!\[.*?\]\(.*?\)/g;
const JAVASCRIPT_LINK_REGEX = /\[.*?\]\(javascript:[^)]+\)/g;
const EMPTY_LINK_REGEX = /\[\s*\]\(.*?\)/g;
const LINK_REGEX = /\[(.*?)\]\(.*?\)/g;
const HEADING_MARKER_REGEX = /^(\s*#{1,6}\s+)(.*)$/;
const MARKUP_CHARS_REGEX = /[#`\\*]+/g;
const BLANK_LINES_REGEX = /\n{2,}/g;

function stripMarkupChars(line: string): string {
  const heading = HEADING_MARKER_REGEX.exec(line);
  if (heading) {
    const [, marker = "", rest = ""] = heading;
    return marker.trimStart() + rest.replace(MARKUP_CHARS_REGEX, "");
  }
  return line.replace(MARKUP_CHARS_REGEX, "");
}

/**
 * Clean Markdown for extraction, in this order:
 *
 * 1. remove images `![alt](src)`
 * 2. remove `javascript:` links
 * 3. remove links with empty text
 * 4. replace remaining links with their text
 * 5. remove `` ` ``, `\`, `*` and `#`, except the `#` run that opens an
 *    ATX heading line
 * 6. collapse runs of newlines to a single blank line, then trim
 *
 * @example
 * ```ts
 * cleanMarkdown("# **Title**\n\n\n![logo](l.png)Use `npm` and #tags");
 * // => "# Title\n\nUse npm and tags"
 * ```
 */
export function cleanMarkdown(markdown: string): string {
  const withoutLinks = markdown
    .replace(IMAGE_REGEX, "")
    .replace(JAVASCRIPT_LINK_REGEX, "")
    .replace(EMPTY_LINK_REGEX, "")
    .replace(LINK_REGEX, "$1");

  return withoutLinks
    .split("\n")
    .map(stripMarkupChars)
    .join("\n")
    .replace(BLANK_LINES_REGEX, "\n\n")
    .trim();
}

/* ────────────────────────────────────────────────────────────────────────────
 * Sectioning
 * ──────────────────────────────────────────────────────────────────────────── */

function headingText(line: string): string {
  return line.replace(/^#+/, "").trim();
}

/**
 * Split cleaned Markdown into sections at lines starting with `#`.
 *
 * - Lines before the first heading form a {@link DEFAULT_SECTION_HEADING}
 *   section.
 * - A heading followed by no content before the next heading is dropped.
 * - If that leaves no sections, the whole text becomes one
 *   {@link DEFAULT_SECTION_HEADING} section (heading lines included as
 *   plain text).
 */
export function extractSections(markdown: string): Section[] {
  const sections: Section[] = [];
  const allLines: string[] = [];
  let current: Section = { heading: DEFAULT_SECTION_HEADING, lines: [] };

  for (const rawLine of markdown.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (line.startsWith("#")) {
      if (current.lines.length > 0) {
        sections.push(current);
      }
      const text = headingText(line);
      current = { heading: text || DEFAULT_SECTION_HEADING, lines: [] };
      if (text) {
        allLines.push(text);
      }
    } else {
      current.lines.push(line);
      allLines.push(line);
    }
  }

  if (current.lines.length > 0) {
    sections.push(current);
  }

  if (sections.length === 0) {
    return [{ heading: DEFAULT_SECTION_HEADING, lines: allLines }];
  }
  return sections;
}
