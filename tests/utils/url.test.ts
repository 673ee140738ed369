/**
 * @fileoverview Tests for URL utility functions.
 *
 * Covers: normalizeUrl (frontier identity), scopeKey (link-filter identity),
 * tryParseUrl, isFetchableUrl, extractDomain.
 */

import { describe, it, expect } from "vitest";
import {
  extractDomain,
  isFetchableUrl,
  normalizeUrl,
  scopeKey,
  tryParseUrl,
} from "../../src/utils/url.js";

// ---------------------------------------------------------------------------
// normalizeUrl
// ---------------------------------------------------------------------------

describe("normalizeUrl", () => {
  it("drops the fragment", () => {
    expect(normalizeUrl("https://docs.example.com/guide#setup")).toBe(
      "https://docs.example.com/guide",
    );
  });

  it("gives a bare origin and its trailing-slash form the same key", () => {
    expect(normalizeUrl("https://docs.example.com/")).toBe("https://docs.example.com");
    expect(normalizeUrl("https://docs.example.com/#top")).toBe("https://docs.example.com");
  });

  it("keeps the trailing slash of deeper paths", () => {
    expect(normalizeUrl("https://docs.example.com/api/")).toBe("https://docs.example.com/api/");
  });

  it("keeps the root slash when a query follows", () => {
    expect(normalizeUrl("https://docs.example.com/?v=2")).toBe("https://docs.example.com/?v=2");
  });

  it("sorts query parameters", () => {
    expect(normalizeUrl("https://docs.example.com/search?z=3&a=1&m=2")).toBe(
      "https://docs.example.com/search?a=1&m=2&z=3",
    );
  });

  it("removes default ports and keeps others", () => {
    expect(normalizeUrl("http://docs.example.com:80/a")).toBe("http://docs.example.com/a");
    expect(normalizeUrl("https://docs.example.com:443/a")).toBe("https://docs.example.com/a");
    expect(normalizeUrl("https://docs.example.com:8443/a")).toBe(
      "https://docs.example.com:8443/a",
    );
  });

  it("lowercases scheme and host but not the path", () => {
    expect(normalizeUrl("HTTPS://Docs.Example.COM/Guide?b=2&a=1#x")).toBe(
      "https://docs.example.com/Guide?a=1&b=2",
    );
  });

  it("throws on a relative or malformed URL", () => {
    expect(() => normalizeUrl("/guide")).toThrow(TypeError);
    expect(() => normalizeUrl("not a url")).toThrow(TypeError);
  });
});

// ---------------------------------------------------------------------------
// scopeKey
// ---------------------------------------------------------------------------

describe("scopeKey", () => {
  it("drops query, fragment and trailing slashes", () => {
    expect(scopeKey("https://ex.org/docs/?page=2#top")).toBe("https://ex.org/docs");
    expect(scopeKey("https://ex.org/docs//")).toBe("https://ex.org/docs");
  });

  it("reduces the root path to the origin", () => {
    expect(scopeKey("https://ex.org/")).toBe("https://ex.org");
  });

  it("keeps a non-default port", () => {
    expect(scopeKey("http://ex.org:8080/docs")).toBe("http://ex.org:8080/docs");
  });
});

// ---------------------------------------------------------------------------
// Parsing and resolution
// ---------------------------------------------------------------------------

describe("tryParseUrl", () => {
  it("returns a URL for valid input and null otherwise", () => {
    expect(tryParseUrl("https://ex.org/a")?.pathname).toBe("/a");
    expect(tryParseUrl("../b", "https://ex.org/docs/a")?.href).toBe("https://ex.org/b");
    expect(tryParseUrl("::nope::")).toBeNull();
  });
});

describe("isFetchableUrl", () => {
  it.each([
    ["https://ex.org/page", true],
    ["http://ex.org/page", true],
    ["javascript:alert(1)", false],
    ["mailto:someone@ex.org", false],
    ["ftp://files.ex.org/readme.txt", false],
    ["/relative/path", false],
    ["", false],
  ])("%s -> %s", (url, expected) => {
    expect(isFetchableUrl(url)).toBe(expected);
  });
});

describe("extractDomain", () => {
  it("returns the lowercased hostname without the port", () => {
    expect(extractDomain("https://Docs.EX.org:8080/page")).toBe("docs.ex.org");
    expect(extractDomain("http://localhost:3000/api")).toBe("localhost");
  });

  it("throws on an invalid URL", () => {
    expect(() => extractDomain("not-a-url")).toThrow();
  });
});
