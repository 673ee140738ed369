/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for docs-graph-mcp.
 *
 * Every error raised by this application extends {@link DocsGraphError},
 * which pairs the human-readable `message` with a stable machine-readable
 * `code`. Codes survive serialization into MCP tool responses, where the
 * class hierarchy does not.
 *
 * ```
 * Error
 *   └── DocsGraphError               code: string
 *         ├── FetchError             "FETCH_FAILED" (+ statusCode)
 *         ├── SecurityError          "SSRF_BLOCKED"
 *         ├── ContentTypeError       "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError  "RESPONSE_TOO_LARGE"
 *         ├── ExtractionError        "EXTRACTION_FAILED"
 *         ├── TimeoutError           "TIMEOUT"
 *         ├── StoreError             "STORE_FAILED"
 *         └── GraphAssemblyError     "GRAPH_ASSEMBLY"
 * ```
 *
 * @example
 * ```ts
 * try {
 *   throw new FetchError("Server returned 503", 503);
 * } catch (err) {
 *   formatErrorForMcp(err); // "[FETCH_FAILED] Server returned 503"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

export class DocsGraphError extends Error {
  /** Stable SCREAMING_SNAKE_CASE code; part of the tool response contract. */
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Fetch-side Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * A page could not be retrieved: DNS, TCP or TLS failure, or a non-2xx
 * response. `statusCode` is set only when the server answered.
 */
export class FetchError extends DocsGraphError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, "FETCH_FAILED", options);
    this.statusCode = statusCode;
  }
}

/**
 * The target host resolves to a loopback, private or link-local address.
 * Never retried.
 */
export class SecurityError extends DocsGraphError {
  constructor(message: string) {
    super(message, "SSRF_BLOCKED");
  }
}

/** The response is not HTML or XML. */
export class ContentTypeError extends DocsGraphError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

export class ResponseTooLargeError extends DocsGraphError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/** HTML was retrieved but could not be turned into the requested shape. */
export class ExtractionError extends DocsGraphError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "EXTRACTION_FAILED", options);
  }
}

/** A request exceeded its time budget or was aborted by the caller. */
export class TimeoutError extends DocsGraphError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Graph-side Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * The persistent graph store could not read or write a graph.
 *
 * Kept apart from the fetch errors so that callers can tell "the crawl
 * worked but saving it did not" from "a page could not be fetched".
 */
export class StoreError extends DocsGraphError {
  public readonly framework: string;

  constructor(message: string, framework: string, options?: ErrorOptions) {
    super(message, "STORE_FAILED", options);
    this.framework = framework;
  }
}

/**
 * A graph assembler was used outside its contract: a node recorded twice,
 * or a mutation after `finalize()`.
 */
export class GraphAssemblyError extends DocsGraphError {
  constructor(message: string) {
    super(message, "GRAPH_ASSEMBLY");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/** Machine-readable code for any caught value; `INTERNAL` when unknown. */
export function errorCode(error: unknown): string {
  return error instanceof DocsGraphError ? error.code : "INTERNAL";
}

/** Message text for any caught value, without the code prefix. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render any caught value as a single line for an MCP response.
 *
 * - {@link DocsGraphError}: `"[CODE] message"`
 * - other `Error`: its message
 * - anything else: `String(value)`
 */
export function formatErrorForMcp(error: unknown): string {
  if (error instanceof DocsGraphError) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}
