/**
 * @fileoverview Tests for HTML → Markdown conversion.
 *
 * Covers: htmlToMarkdown (headings, emphasis, links, highlighted code
 * blocks, strikethrough) and postProcessMarkdown cleanup.
 */

import { describe, it, expect } from "vitest";
import { htmlToMarkdown, postProcessMarkdown } from "../../src/extractor/markdown-converter.js";

// ---------------------------------------------------------------------------
// htmlToMarkdown — inline and block basics
// ---------------------------------------------------------------------------

describe("htmlToMarkdown — basics", () => {
  it("writes ATX headings", () => {
    expect(htmlToMarkdown("<h1>Guide</h1>")).toBe("# Guide");
    expect(htmlToMarkdown("<h3>Options</h3>")).toBe("### Options");
  });

  it("uses ** for strong and _ for emphasis", () => {
    expect(htmlToMarkdown("<p><strong>Note</strong> and <em>aside</em></p>")).toBe(
      "**Note** and _aside_",
    );
  });

  it("keeps links", () => {
    expect(htmlToMarkdown('<p>See <a href="https://docs.example.com/api/">the API</a>.</p>')).toBe(
      "See [the API](https://docs.example.com/api/).",
    );
  });

  it("renders <del>, <s> and <strike> as strikethrough", () => {
    expect(htmlToMarkdown("<p><del>old</del> <s>older</s> <strike>oldest</strike></p>")).toBe(
      "~~old~~ ~~older~~ ~~oldest~~",
    );
  });

  it("returns an empty string for blank input", () => {
    expect(htmlToMarkdown("")).toBe("");
    expect(htmlToMarkdown("   \n  ")).toBe("");
  });
});

// ---------------------------------------------------------------------------
// htmlToMarkdown — code blocks
// ---------------------------------------------------------------------------

describe("htmlToMarkdown — code blocks", () => {
  it("reads the language from a language- class on <code>", () => {
    const html = '<h2>Install</h2><pre><code class="language-sh">npm i widgetry</code></pre>';

    expect(htmlToMarkdown(html)).toBe("## Install\n\n```sh\nnpm i widgetry\n```");
  });

  it("reads the language from data-language on <pre>", () => {
    const html = '<pre data-language="ts"><code>const a = 1;</code></pre>';

    expect(htmlToMarkdown(html)).toBe("```ts\nconst a = 1;\n```");
  });

  it("flattens highlighter markup to plain text", () => {
    const html =
      '<pre class="highlight-source-js"><code><span class="kw">let</span> x <span class="op">=</span> 2;</code></pre>';

    expect(htmlToMarkdown(html)).toBe("```js\nlet x = 2;\n```");
  });

  it("omits the language when none is declared", () => {
    expect(htmlToMarkdown("<pre>plain text</pre>")).toBe("```\nplain text\n```");
  });

  it("switches to a tilde fence when the code contains backtick fences", () => {
    const html = "<pre><code>```\nnested\n```</code></pre>";

    expect(htmlToMarkdown(html)).toBe("~~~\n```\nnested\n```\n~~~");
  });
});

// ---------------------------------------------------------------------------
// postProcessMarkdown
// ---------------------------------------------------------------------------

describe("postProcessMarkdown", () => {
  it("collapses runs of blank lines to one", () => {
    expect(postProcessMarkdown("a\n\n\n\n\nb")).toBe("a\n\nb");
    expect(postProcessMarkdown("a\n\nb\nc")).toBe("a\n\nb\nc");
  });

  it("drops trailing spaces and tabs on each line and trims the result", () => {
    expect(postProcessMarkdown("  \nline one  \t\nline two \n\n")).toBe("line one\nline two");
  });

  it("removes zero-width and soft-hyphen characters", () => {
    expect(postProcessMarkdown("use\u200BState and re\u00ADact\uFEFF")).toBe("useState and react");
  });
});
