/**
 * @module crawler/link-resolver
 * @fileoverview Collects the outbound links of a page as absolute URLs.
 *
 * Runs on the raw page, before any noise removal: on documentation sites
 * the sidebar and "next page" navigation are where most of the links to
 * other doc pages live.
 *
 * For each `<a href>`:
 *
 * 1. Skip empty hrefs, same-page fragments (`#top`) and schemes that cannot
 *    be fetched (`mailto:`, `javascript:`, ...).
 * 2. Resolve against `<base href>` when present, else the page URL.
 * 3. Skip anything that is not http(s) after resolution.
 * 4. Deduplicate on the normalized URL; the first occurrence wins and keeps
 *    its original query and fragment.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { PageLink } from "./types.js";
import { extractDomain, isFetchableUrl, normalizeUrl, tryParseUrl } from "../utils/url.js";

const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/** Document base URL: `<base href>` resolved against the page URL. */
function documentBase($: CheerioAPI, pageUrl: string): string {
  const href = $("base[href]").first().attr("href")?.trim();
  if (!href) return pageUrl;
  return tryParseUrl(href, pageUrl)?.href ?? pageUrl;
}

/**
 * @param source  Page HTML, or an already loaded cheerio document.
 * @param pageUrl Absolute URL of the page (after redirects).
 *
 * @example
 * ```ts
 * extractLinks('<a href="../api/#use">API</a>', "https://ex.org/docs/guide/");
 * // => [{ text: "API", url: "https://ex.org/docs/api/#use", internal: true }]
 * ```
 */
export function extractLinks(source: string | CheerioAPI, pageUrl: string): PageLink[] {
  const $ = typeof source === "string" ? cheerio.load(source) : source;
  const base = documentBase($, pageUrl);
  const pageDomain = extractDomain(pageUrl);

  const seen = new Set<string>();
  const links: PageLink[] = [];

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#") || hasNonFetchableScheme(href)) return;

    const resolved = tryParseUrl(href, base);
    if (resolved === null || !isFetchableUrl(resolved.href)) return;

    const key = normalizeUrl(resolved.href);
    if (seen.has(key)) return;
    seen.add(key);

    links.push({
      text: $(element).text().replace(/\s+/g, " ").trim(),
      url: resolved.href,
      internal: resolved.hostname === pageDomain,
    });
  });

  return links;
}
