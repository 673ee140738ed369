/**
 * @module extractor/html-extractor
 * @fileoverview Main-content extraction for document-mode fetches.
 *
 * Two phases:
 *
 * 1. **Noise removal** (cheerio): scripts, styles, site chrome and the
 *    sidebars, tables of contents and "edit this page" widgets common to
 *    documentation generators are dropped, along with HTML comments.
 * 2. **Readability** (jsdom + @mozilla/readability): scores what remains and
 *    isolates the article body.
 *
 * When Readability finds no article (very short pages, pages that are
 * mostly tables or lists), a cheerio fallback returns the whole cleaned
 * `<main>` (or `<body>`) instead of collapsing it to plain text, so code
 * blocks and headings survive into the Markdown.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface ExtractedContent {
  title: string;
  /** Article HTML, ready for Markdown conversion. */
  content: string;
  /** Article text without markup. */
  textContent: string;
  excerpt?: string;
  siteName?: string;
  /** Character length of `textContent`. */
  length: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Noise Removal
 * ──────────────────────────────────────────────────────────────────────────── */

const NOISE_SELECTORS: readonly string[] = [
  "script",
  "noscript",
  "style",
  "template",
  "iframe",
  "nav",
  "footer",
  "aside",
  "body > header",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
  "[aria-label='breadcrumb']",
  ".sidebar",
  ".toc",
  ".table-of-contents",
  ".edit-this-page",
  ".theme-edit-this-page",
  ".pagination-nav",
];

/**
 * Parse `html` with cheerio and strip navigation chrome and comments.
 *
 * Shared by the document and structured extractors so both see the same
 * cleaned tree.
 */
export function loadCleanHtml(html: string): CheerioAPI {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS.join(", ")).remove();
  $("*")
    .contents()
    .filter((_index, node) => node.type === "comment")
    .remove();
  return $;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Metadata Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function firstNonEmpty(values: ReadonlyArray<string | undefined>): string {
  for (const value of values) {
    const trimmed = value?.replace(/\s+/g, " ").trim();
    if (trimmed) return trimmed;
  }
  return "";
}

/** `og:title`, then `<title>`, then the first `<h1>`. */
export function extractDocumentTitle($: CheerioAPI): string {
  return firstNonEmpty([
    $('meta[property="og:title"]').attr("content"),
    $("title").first().text(),
    $("h1").first().text(),
  ]);
}

/** `<meta name="description">`, then `og:description`, or `undefined`. */
export function extractDescription($: CheerioAPI): string | undefined {
  const description = firstNonEmpty([
    $('meta[name="description"]').attr("content"),
    $('meta[property="og:description"]').attr("content"),
  ]);
  return description || undefined;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Isolate the readable content of a documentation page.
 *
 * @param html Raw page HTML.
 * @param url  Page URL; lets Readability resolve relative links and images.
 */
export function extractFromHtml(html: string, url: string): ExtractedContent {
  const $ = loadCleanHtml(html);
  const cleanedHtml = $.html();

  const dom = new JSDOM(cleanedHtml, { url });
  try {
    const article = new Readability(dom.window.document).parse();
    if (article?.content) {
      const textContent = article.textContent ?? "";
      return {
        title: article.title || extractDocumentTitle($),
        content: article.content,
        textContent,
        excerpt: article.excerpt || undefined,
        siteName: article.siteName || undefined,
        length: textContent.length,
      };
    }
  } finally {
    dom.window.close();
  }

  const root = $("main").first().length > 0 ? $("main").first() : $("body");
  const textContent = root.text().replace(/\s+/g, " ").trim();
  return {
    title: extractDocumentTitle($),
    content: root.html() ?? "",
    textContent,
    excerpt: extractDescription($),
    length: textContent.length,
  };
}
