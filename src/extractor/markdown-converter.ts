/**
 * @module extractor/markdown-converter
 * @fileoverview HTML → Markdown for document-mode results.
 *
 * Built on Turndown with ATX headings, fenced code and `-` bullets. Two
 * rules are added on top of Turndown's defaults:
 *
 * - **highlightedCodeBlock**: syntax-highlighted `<pre>` blocks (Prism,
 *   highlight.js, Shiki) are flattened to their text, and the language is
 *   read from `language-*` / `lang-*` / `highlight-source-*` classes or a
 *   `data-language` attribute on the `<pre>` or its `<code>`.
 * - **strikethrough**: `<del>`, `<s>`, `<strike>` → `~~text~~`.
 */

import TurndownService from "turndown";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

const ZERO_WIDTH_CHARS_REGEX =
  /[\u200B\u200C\u200D\u200E\u200F\uFEFF\u00AD\u2060\u2061\u2062\u2063\u2064]/g;

const EXCESSIVE_NEWLINES_REGEX = /\n{3,}/g;

const TRAILING_WHITESPACE_REGEX = /[ \t]+$/gm;

const LANGUAGE_CLASS_REGEX = /(?:^|\s)(?:language|lang|highlight-source)-([\w+#.-]+)/;

/* ────────────────────────────────────────────────────────────────────────────
 * Turndown Setup
 * ──────────────────────────────────────────────────────────────────────────── */

function codeLanguage(pre: HTMLElement): string {
  const candidates: Array<Element | null> = [pre, pre.querySelector("code")];
  for (const element of candidates) {
    if (!element) continue;
    const dataLanguage = element.getAttribute("data-language");
    if (dataLanguage?.trim()) return dataLanguage.trim();
    const match = LANGUAGE_CLASS_REGEX.exec(element.getAttribute("class") ?? "");
    if (match) return match[1];
  }
  return "";
}

function createTurndownService(): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
    emDelimiter: "_",
  });

  turndownService.addRule("highlightedCodeBlock", {
    filter: (node) => node.nodeName === "PRE",
    replacement: (_content, node) => {
      const code = (node.textContent ?? "").replace(/\n$/, "");
      const fence = code.includes("```") ? "~~~" : "```";
      return `\n\n${fence}${codeLanguage(node)}\n${code}\n${fence}\n\n`;
    },
  });

  turndownService.addRule("strikethrough", {
    filter: ["del", "s", "strike"],
    replacement: (content) => (content.trim() ? `~~${content}~~` : ""),
  });

  return turndownService;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * @example
 * ```ts
 * htmlToMarkdown('<h2>Install</h2><pre class="language-sh"><code>npm i x</code></pre>');
 * // => "## Install\n\n```sh\nnpm i x\n```"
 * ```
 */
export function htmlToMarkdown(html: string): string {
  if (!html.trim()) return "";
  return postProcessMarkdown(createTurndownService().turndown(html));
}

/**
 * Strip invisible characters, collapse runs of blank lines to one, drop
 * trailing whitespace on every line, and trim.
 */
export function postProcessMarkdown(markdown: string): string {
  return markdown
    .replace(ZERO_WIDTH_CHARS_REGEX, "")
    .replace(EXCESSIVE_NEWLINES_REGEX, "\n\n")
    .replace(TRAILING_WHITESPACE_REGEX, "")
    .trim();
}
