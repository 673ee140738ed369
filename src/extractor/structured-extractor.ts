/**
 * @module extractor/structured-extractor
 * @fileoverview Heuristic structured fields for documentation pages.
 *
 * Documentation generators (Docusaurus, VitePress, Sphinx, MkDocs, JSDoc,
 * rustdoc...) differ in markup but agree on a few conventions, which are
 * what this extractor relies on:
 *
 * | Field        | Source                                                        |
 * |--------------|---------------------------------------------------------------|
 * | title        | first `<h1>`, else `og:title`, else `<title>`                 |
 * | concepts     | `<h2>`/`<h3>` headings without inline `<code>`                |
 * | api surface  | `<h2>`–`<h4>` headings with `<code>` (+ next paragraph), and  |
 * |              | `<dl>` terms containing `<code>` (+ their `<dd>`)             |
 * | code samples | `<pre>` blocks                                                |
 *
 * Headings are read without their permalink decorations (`#`, `¶`).
 * Everything is looked up inside `<main>`/`<article>` when the page has one.
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { ApiEntry, StructuredFields } from "../crawler/types.js";
import { loadCleanHtml } from "./html-extractor.js";

export const MAX_CONCEPTS = 40;
export const MAX_API_ENTRIES = 60;
export const MAX_CODE_SAMPLES = 20;

const PERMALINK_SELECTOR = ".headerlink, .hash-link, .header-anchor, .anchor, [aria-hidden='true']";
const PERMALINK_GLYPHS = /(?:\s+#|\s*[¶§])+$/;

export interface StructuredPage {
  title: string;
  fields: StructuredFields;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Visible heading text without permalink anchors or trailing glyphs. */
function headingText(heading: Cheerio<Element>): string {
  const copy = heading.clone();
  copy.find(PERMALINK_SELECTOR).remove();
  return collapse(copy.text()).replace(PERMALINK_GLYPHS, "");
}

function pickTitle($: CheerioAPI, scope: Cheerio<Element>): string {
  const h1 = scope.find("h1").first();
  if (h1.length > 0) {
    const text = headingText(h1);
    if (text) return text;
  }
  const ogTitle = collapse($('meta[property="og:title"]').attr("content") ?? "");
  if (ogTitle) return ogTitle;
  return collapse($("title").first().text());
}

/** First paragraph after `heading` and before the next heading. */
function paragraphAfter(heading: Cheerio<Element>): string {
  return collapse(heading.nextUntil("h1, h2, h3, h4, h5, h6", "p").first().text());
}

function termDescription(term: Cheerio<Element>): string {
  const definition = term.nextAll("dd").first();
  const paragraph = definition.find("p").first();
  return collapse(paragraph.length > 0 ? paragraph.text() : definition.text());
}

/**
 * Extract title and structured fields from a page.
 *
 * @example
 * ```ts
 * extractStructured(`
 *   <main><h1>Router</h1>
 *   <h2>Nested routes</h2>
 *   <h3><code>createRouter(options)</code></h3><p>Creates a router.</p>
 *   <pre><code>createRouter({ routes })</code></pre></main>`);
 * // => {
 * //   title: "Router",
 * //   fields: {
 * //     concepts: ["Nested routes"],
 * //     apiSurface: [{ name: "createRouter(options)", description: "Creates a router." }],
 * //     codeSamples: ["createRouter({ routes })"],
 * //   },
 * // }
 * ```
 */
export function extractStructured(html: string): StructuredPage {
  const $ = loadCleanHtml(html);
  const main = $("main, article, [role='main']").first();
  const scope = main.length > 0 ? main : $("body");

  const concepts = new Set<string>();
  const apiSurface: ApiEntry[] = [];
  const apiNames = new Set<string>();

  const addApi = (name: string, description: string): void => {
    if (!name || apiNames.has(name) || apiSurface.length >= MAX_API_ENTRIES) return;
    apiNames.add(name);
    apiSurface.push({ name, description });
  };

  scope.find("h2, h3, h4").each((_index, element) => {
    const heading = $(element);
    const code = heading.find("code").first();
    if (code.length > 0) {
      addApi(collapse(code.text()), paragraphAfter(heading));
      return;
    }
    if (element.tagName === "h4" || concepts.size >= MAX_CONCEPTS) return;
    const text = headingText(heading);
    if (text) concepts.add(text);
  });

  scope.find("dl > dt").each((_index, element) => {
    const term = $(element);
    if (term.find("code").length === 0) return;
    addApi(headingText(term), termDescription(term));
  });

  const codeSamples = new Set<string>();
  scope.find("pre").each((_index, element) => {
    if (codeSamples.size >= MAX_CODE_SAMPLES) return;
    const sample = $(element).text().replace(/^\n+|\s+$/g, "");
    if (sample) codeSamples.add(sample);
  });

  return {
    title: pickTitle($, scope),
    fields: {
      concepts: [...concepts],
      apiSurface,
      codeSamples: [...codeSamples],
    },
  };
}
