/**
 * @module crawler/link-filter
 * @fileoverview Decides whether a discovered link may join the traversal.
 *
 * Two tiers, both required:
 *
 * 1. **Scope**: the link must be the base URL itself or lie beneath its path
 *    on the same scheme and host. Comparison uses {@link scopeKey}, so query
 *    strings and fragments never move a link in or out of scope.
 * 2. **Intent**: the link must contain one of the caller's pattern
 *    substrings, or one of {@link DEFAULT_PATTERNS} when none were given.
 *    The base URL itself skips this tier.
 *
 * Rejections are expected and frequent; they are not logged.
 */

import { scopeKey } from "../utils/url.js";

/** Path fragments that usually mark reference material rather than marketing pages. */
export const DEFAULT_PATTERNS: readonly string[] = [
  "/api/",
  "/guide/",
  "/docs/",
  "/reference/",
  "/tutorial/",
];

function safeScopeKey(url: string): string | null {
  try {
    return scopeKey(url);
  } catch {
    return null;
  }
}

/**
 * True when `link` sits at or below `base` on a path-segment boundary.
 * `https://ex.org/docs` covers `https://ex.org/docs/intro` but not
 * `https://ex.org/docs-legacy`.
 */
function isWithinScope(linkKey: string, baseKey: string): boolean {
  return linkKey === baseKey || linkKey.startsWith(`${baseKey}/`);
}

/**
 * @param link     Absolute URL found on a crawled page.
 * @param baseUrl  Root of the traversal.
 * @param patterns Substrings of which at least one must occur in `link`.
 *                 Empty or omitted selects {@link DEFAULT_PATTERNS}.
 *
 * @example
 * ```ts
 * isEligible("https://ex.org/docs/api/foo", "https://ex.org/docs"); // true
 * isEligible("https://ex.org/about", "https://ex.org/docs");        // false
 * isEligible("https://ex.org/docs/", "https://ex.org/docs", ["/x/"]); // true (the base itself)
 * ```
 */
export function isEligible(
  link: string,
  baseUrl: string,
  patterns?: readonly string[],
): boolean {
  const linkKey = safeScopeKey(link);
  const baseKey = safeScopeKey(baseUrl);
  if (linkKey === null || baseKey === null) return false;

  if (linkKey === baseKey) return true;
  if (!isWithinScope(linkKey, baseKey)) return false;

  const active = patterns && patterns.length > 0 ? patterns : DEFAULT_PATTERNS;
  return active.some((pattern) => link.includes(pattern));
}

/**
 * Build a predicate bound to one traversal's base URL and patterns.
 */
export function createLinkFilter(
  baseUrl: string,
  patterns?: readonly string[],
): (link: string) => boolean {
  return (link) => isEligible(link, baseUrl, patterns);
}
