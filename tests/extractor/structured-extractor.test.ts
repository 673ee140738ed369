/**
 * @fileoverview Tests for structured field extraction.
 *
 * Covers: title selection, concepts from headings, API entries from code
 * headings and definition lists, code samples, scoping and caps.
 */

import { describe, it, expect } from "vitest";
import {
  MAX_API_ENTRIES,
  MAX_CODE_SAMPLES,
  extractStructured,
} from "../../src/extractor/structured-extractor.js";

const ROUTER_PAGE = `
  <html>
    <head><title>Router | Widgetry</title></head>
    <body>
      <nav><h2>Sidebar Section</h2></nav>
      <main>
        <h1>Router <a class="hash-link" href="#router">#</a></h1>
        <h2>Nested routes</h2>
        <p>Routes can contain child routes.</p>
        <h3><code>createRouter(options)</code></h3>
        <p>Creates a router instance.</p>
        <p>Second paragraph is not used.</p>
        <h3>Navigation guards ¶</h3>
        <h4><code>router.push(to)</code></h4>
        <div>not a paragraph</div>
        <h4>Internals</h4>
        <pre><code>
createRouter({ routes })
</code></pre>
        <pre><code>router.push("/home")</code></pre>
        <pre><code>router.push("/home")</code></pre>
        <dl>
          <dt><code>history</code></dt>
          <dd><p>History implementation.</p><p>More.</p></dd>
          <dt><code>scrollBehavior</code></dt>
          <dd>Controls scrolling.</dd>
          <dt>Plain term</dt>
          <dd>Ignored.</dd>
        </dl>
      </main>
    </body>
  </html>
`;

describe("extractStructured", () => {
  const { title, fields } = extractStructured(ROUTER_PAGE);

  it("takes the title from <h1> without its permalink", () => {
    expect(title).toBe("Router");
  });

  it("collects h2/h3 headings without code as concepts", () => {
    expect(fields.concepts).toEqual(["Nested routes", "Navigation guards"]);
  });

  it("collects code headings and definition terms as API entries", () => {
    expect(fields.apiSurface).toEqual([
      { name: "createRouter(options)", description: "Creates a router instance." },
      { name: "router.push(to)", description: "" },
      { name: "history", description: "History implementation." },
      { name: "scrollBehavior", description: "Controls scrolling." },
    ]);
  });

  it("collects distinct code samples without surrounding blank lines", () => {
    expect(fields.codeSamples).toEqual(["createRouter({ routes })", 'router.push("/home")']);
  });

  it("ignores headings outside the main content", () => {
    expect(fields.concepts).not.toContain("Sidebar Section");
  });
});

describe("extractStructured — fallbacks", () => {
  it("uses og:title, then <title>, when the page has no <h1>", () => {
    const withOg = extractStructured(
      '<head><meta property="og:title" content="OG Name"><title>Tab</title></head><body><p>x</p></body>',
    );
    const withTitle = extractStructured("<head><title>Tab  Name</title></head><body><p>x</p></body>");

    expect(withOg.title).toBe("OG Name");
    expect(withTitle.title).toBe("Tab Name");
  });

  it("reads the whole body when there is no main element", () => {
    const { fields } = extractStructured("<body><h2>Setup</h2><pre>npm i widgetry</pre></body>");

    expect(fields.concepts).toEqual(["Setup"]);
    expect(fields.codeSamples).toEqual(["npm i widgetry"]);
  });

  it("returns empty fields for a page without structure", () => {
    expect(extractStructured("<p>Just text.</p>")).toEqual({
      title: "",
      fields: { concepts: [], apiSurface: [], codeSamples: [] },
    });
  });

  it("keeps the first entry for a repeated API name", () => {
    const { fields } = extractStructured(`
      <main>
        <h3><code>use()</code></h3><p>First.</p>
        <h3><code>use()</code></h3><p>Second.</p>
      </main>`);

    expect(fields.apiSurface).toEqual([{ name: "use()", description: "First." }]);
  });

  it("caps API entries and code samples", () => {
    const headings = Array.from({ length: MAX_API_ENTRIES + 5 }, (_, i) => `<h3><code>fn${i}()</code></h3>`);
    const samples = Array.from({ length: MAX_CODE_SAMPLES + 5 }, (_, i) => `<pre>sample ${i}</pre>`);
    const { fields } = extractStructured(`<main>${headings.join("")}${samples.join("")}</main>`);

    expect(fields.apiSurface).toHaveLength(MAX_API_ENTRIES);
    expect(fields.codeSamples).toHaveLength(MAX_CODE_SAMPLES);
    expect(fields.codeSamples[0]).toBe("sample 0");
  });
});
