/**
 * @fileoverview Tests for main-content extraction.
 *
 * Covers: loadCleanHtml noise removal, the title and description helpers,
 * and extractFromHtml on documentation-style pages.
 */

import * as cheerio from "cheerio";
import { describe, it, expect } from "vitest";
import {
  extractDescription,
  extractDocumentTitle,
  extractFromHtml,
  loadCleanHtml,
} from "../../src/extractor/html-extractor.js";

const DOC_PAGE = `
  <!DOCTYPE html>
  <html>
    <head>
      <title>Routing | Widgetry Docs</title>
      <meta name="description" content="How requests reach handlers.">
      <script>window.analytics = "tracking";</script>
      <style>.hero { color: red; }</style>
    </head>
    <body>
      <header><a href="/">Widgetry</a></header>
      <nav class="sidebar"><a href="/docs/intro">Sidebar Intro Link</a></nav>
      <main>
        <article>
          <h1>Routing</h1>
          <p>Routes map an incoming request path to the handler that answers it.
          Every application declares its routes once, when it starts, and the
          router matches them in the order they were registered.</p>
          <p>Route parameters are written with a leading colon and are passed to
          the handler in the params object, already decoded and ready to use.</p>
          <pre><code>app.get("/users/:id", handler)</code></pre>
          <p>Wildcard segments match the remainder of the path and are useful for
          serving static assets from a directory below a fixed prefix.</p>
        </article>
      </main>
      <div class="edit-this-page">Edit this page on the forge</div>
      <aside>Related: middleware</aside>
      <footer>Footer legal text</footer>
    </body>
  </html>
`;

// ---------------------------------------------------------------------------
// loadCleanHtml
// ---------------------------------------------------------------------------

describe("loadCleanHtml", () => {
  it("removes scripts, styles and site chrome", () => {
    const $ = loadCleanHtml(DOC_PAGE);

    expect($("script, style, nav, aside, footer").length).toBe(0);
    expect($("body > header").length).toBe(0);
    expect($(".edit-this-page").length).toBe(0);
    expect($("article h1").text()).toBe("Routing");
  });

  it("removes HTML comments", () => {
    const $ = loadCleanHtml("<body><p>kept<!-- dropped --></p></body>");

    expect($("p").html()).toBe("kept");
  });

  it("keeps a header inside the article", () => {
    const $ = loadCleanHtml("<body><article><header><h1>Title</h1></header></article></body>");

    expect($("article header h1").text()).toBe("Title");
  });
});

// ---------------------------------------------------------------------------
// Metadata helpers
// ---------------------------------------------------------------------------

describe("extractDocumentTitle", () => {
  it("prefers og:title over <title> and <h1>", () => {
    const $ = cheerio.load(
      '<head><meta property="og:title" content="OG Title"><title>Tab</title></head><h1>Heading</h1>',
    );
    expect(extractDocumentTitle($)).toBe("OG Title");
  });

  it("falls back to <title>, then <h1>", () => {
    expect(extractDocumentTitle(cheerio.load("<title>  Tab\n Title </title><h1>H</h1>"))).toBe(
      "Tab Title",
    );
    expect(extractDocumentTitle(cheerio.load("<h1>Only Heading</h1>"))).toBe("Only Heading");
  });

  it("returns an empty string when nothing names the page", () => {
    expect(extractDocumentTitle(cheerio.load("<p>text</p>"))).toBe("");
  });
});

describe("extractDescription", () => {
  it("reads the description meta tag, then og:description", () => {
    expect(extractDescription(cheerio.load(DOC_PAGE))).toBe("How requests reach handlers.");
    expect(
      extractDescription(cheerio.load('<meta property="og:description" content="From OG">')),
    ).toBe("From OG");
  });

  it("returns undefined when the page has none", () => {
    expect(extractDescription(cheerio.load("<p>text</p>"))).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// extractFromHtml
// ---------------------------------------------------------------------------

describe("extractFromHtml", () => {
  it("keeps the article text and drops the noise", () => {
    const result = extractFromHtml(DOC_PAGE, "https://docs.example.com/routing");

    expect(result.textContent).toContain("Routes map an incoming request path");
    expect(result.textContent).not.toContain("tracking");
    expect(result.textContent).not.toContain("Sidebar Intro Link");
    expect(result.textContent).not.toContain("Footer legal text");
    expect(result.content).not.toContain("<script");
    expect(result.length).toBe(result.textContent.length);
  });

  it("keeps code blocks in the article HTML", () => {
    const result = extractFromHtml(DOC_PAGE, "https://docs.example.com/routing");

    expect(result.content).toContain("<pre>");
    expect(result.content).toContain("/users/:id");
  });

  it("returns an empty result for a page with no content", () => {
    const html = `
      <html><head><title>Only Scripts</title></head>
      <body><script>console.log("nothing");</script></body></html>
    `;
    const result = extractFromHtml(html, "https://docs.example.com/empty");

    expect(result.title).toBe("Only Scripts");
    expect(result.textContent).toBe("");
    expect(result.length).toBe(0);
  });
});
