/**
 * @module utils/url
 * @fileoverview URL helpers shared by the crawler, link filter and fetch layer.
 *
 * Two notions of URL identity are used in this project:
 *
 * - {@link normalizeUrl}: the dedup key of the frontier. Drops the fragment,
 *   sorts query parameters and strips the default port, so two spellings of
 *   one page are claimed only once.
 * - {@link scopeKey}: the comparison key of the link filter. Scheme, host and
 *   path only; query and fragment never decide whether a link is in scope.
 *
 * All functions use the WHATWG `URL` class, which already lowercases the
 * scheme and host and resolves `.`/`..` segments.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/** Parse `url`, returning `null` instead of throwing on malformed input. */
export function tryParseUrl(url: string, base?: string): URL | null {
  try {
    return new URL(url, base);
  } catch {
    return null;
  }
}

/** True for absolute `http:` / `https:` URLs. */
export function isFetchableUrl(url: string): boolean {
  const parsed = tryParseUrl(url);
  return parsed !== null && FETCHABLE_SCHEMES.has(parsed.protocol);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Canonical form of a URL for deduplication.
 *
 * @throws {TypeError} When `url` is not a valid absolute URL.
 *
 * @example
 * ```ts
 * normalizeUrl("HTTPS://Docs.Example.com:443/guide?b=2&a=1#intro");
 * // => "https://docs.example.com/guide?a=1&b=2"
 * normalizeUrl("https://docs.example.com/");
 * // => "https://docs.example.com"
 * ```
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";
  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }
  parsed.searchParams.sort();

  const normalized = parsed.toString();
  // A bare origin serializes with a trailing "/"; drop it so that
  // "https://a.com" and "https://a.com/" share a key.
  if (parsed.pathname === "/" && !parsed.search) {
    return normalized.replace(/\/$/, "");
  }
  return normalized;
}

/**
 * Scope comparison key: `scheme://host[:port]/path` with query, fragment and
 * trailing slashes removed.
 *
 * @throws {TypeError} When `url` is not a valid absolute URL.
 *
 * @example
 * ```ts
 * scopeKey("https://ex.org/docs/?page=2#top"); // "https://ex.org/docs"
 * scopeKey("https://ex.org/");                 // "https://ex.org"
 * ```
 */
export function scopeKey(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${parsed.host}${path}`;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Hostnames
 * ──────────────────────────────────────────────────────────────────────────── */

/** Lowercased hostname of `url`, without the port. */
export function extractDomain(url: string): string {
  return new URL(url).hostname;
}
