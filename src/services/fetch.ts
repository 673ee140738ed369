/**
 * @module services/fetch
 * @fileoverview Guarded HTTP GET used by the HTTP fetch client.
 *
 * Pipeline for one request:
 *
 * 1. Parse and check the scheme (`http:` / `https:` only).
 * 2. SSRF check on the hostname, unless private networks are allowed.
 * 3. Wait for a slot in the {@link QueueManager}.
 * 4. `fetch()` with a per-request timeout, combined with the caller's
 *    abort signal when one is given.
 * 5. Reject non-2xx responses and non-HTML content types.
 * 6. Stream the body, aborting once it passes `maxResponseSize`.
 *
 * Every failure surfaces as a {@link DocsGraphError} subclass so the
 * dispatcher can classify it without inspecting messages.
 */

import { validateHostname } from "../utils/network.js";
import { tryParseUrl } from "../utils/url.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";
import type { QueueManager } from "./queue.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface FetchResult {
  /** Decoded response body. */
  html: string;
  /** Final URL after redirects. */
  url: string;
  contentType: string;
  statusCode: number;
}

export interface SafeFetchOptions {
  queue: QueueManager;
  timeoutMs: number;
  maxResponseSize: number;
  userAgent: string;
  allowPrivateNetwork: boolean;
  /** Caller cancellation; aborts a queued or in-flight request. */
  signal?: AbortSignal;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Content-Type Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

function extractMimeType(contentType: string | null): string {
  if (!contentType) return "";
  return contentType.split(";")[0].trim().toLowerCase();
}

/* ────────────────────────────────────────────────────────────────────────────
 * Body Reading
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read the body as UTF-8 text, rejecting it as soon as either the declared
 * `Content-Length` or the streamed byte count exceeds `maxBytes`.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string> {
  const declared = parseInt(response.headers.get("content-length") ?? "", 10);
  if (!Number.isNaN(declared) && declared > maxBytes) {
    throw new ResponseTooLargeError(
      `Response Content-Length (${declared} bytes) exceeds limit of ${maxBytes} bytes`,
    );
  }

  if (!response.body) return "";

  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }
      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) throw error;
    throw toRequestError(error, response.url, "Error reading response body");
  }

  return chunks.join("");
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Mapping
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Map a rejection from `fetch()`, the body stream or the queue onto the
 * error hierarchy. `AbortSignal.timeout` rejects with a DOMException named
 * `TimeoutError`; a caller abort rejects with one named `AbortError`.
 */
function toRequestError(error: unknown, url: string, context: string): Error {
  if (error instanceof TimeoutError || error instanceof FetchError) {
    return error;
  }
  if (error instanceof DOMException && error.name === "TimeoutError") {
    return new TimeoutError(`${context}: ${url} timed out`);
  }
  if (error instanceof DOMException && error.name === "AbortError") {
    return new FetchError(`${context}: request to ${url} was aborted`, undefined, {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(`${context}: ${url}: ${message}`, undefined, { cause: error });
}

/* ────────────────────────────────────────────────────────────────────────────
 * safeFetch
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * GET `url` under the SSRF, rate, time and size limits in `options`.
 *
 * @throws {FetchError}            Bad URL, network failure, non-2xx, abort.
 * @throws {SecurityError}         Host resolves to a private address.
 * @throws {TimeoutError}          No complete response within `timeoutMs`.
 * @throws {ContentTypeError}      Response is not HTML/XML.
 * @throws {ResponseTooLargeError} Body larger than `maxResponseSize`.
 */
export async function safeFetch(url: string, options: SafeFetchOptions): Promise<FetchResult> {
  const parsed = tryParseUrl(url);
  if (parsed === null) {
    throw new FetchError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new FetchError(
      `Unsupported protocol: ${parsed.protocol} (only http: and https: are allowed)`,
    );
  }
  parsed.hash = "";
  const target = parsed.href;

  if (!options.allowPrivateNetwork) {
    await validateHostname(parsed.hostname);
  }

  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await options.queue.enqueue(
      parsed.hostname,
      () =>
        fetch(target, {
          signal,
          headers: {
            "User-Agent": options.userAgent,
            Accept: "text/html, application/xhtml+xml, */*;q=0.1",
            "Accept-Language": "en-US,en;q=0.9",
          },
          redirect: "follow",
        }),
      options.signal,
    );
  } catch (error) {
    throw toRequestError(error, target, "Failed to fetch");
  }

  if (!response.ok) {
    throw new FetchError(
      `HTTP ${response.status} ${response.statusText} for ${target}`,
      response.status,
    );
  }

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (!ALLOWED_CONTENT_TYPES.has(mimeType)) {
    throw new ContentTypeError(
      `Unacceptable Content-Type "${mimeType || "(none)"}" for ${target}; ` +
        `expected one of: ${Array.from(ALLOWED_CONTENT_TYPES).join(", ")}`,
    );
  }

  const html = await readBodyWithLimit(response, options.maxResponseSize);

  return {
    html,
    url: response.url || target,
    contentType: contentType ?? "text/html",
    statusCode: response.status,
  };
}
