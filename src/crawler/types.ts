/**
 * @module crawler/types
 * @fileoverview Shapes exchanged across the fetch-client boundary.
 *
 * A {@link FetchClient} turns one {@link PageRequest} into one
 * {@link PageResult}. Everything on the traversal side (dispatcher, link
 * filter, assembler) works only with these types, so any client, real or
 * fake, can drive a traversal.
 */

/**
 * Requested shape of a single-page result.
 *
 * - `document`: rendered page text (Markdown), no structured fields.
 * - `structured`: title, concepts, API surface, code samples.
 * - `links`: only the outbound link list is guaranteed.
 */
export type ExtractionMode = "document" | "structured" | "links";

export interface PageRequest {
  readonly url: string;
  readonly mode: ExtractionMode;
}

/** One documented API element, e.g. a function signature and its summary. */
export interface ApiEntry {
  name: string;
  description: string;
}

export interface StructuredFields {
  concepts: string[];
  apiSurface: ApiEntry[];
  codeSamples: string[];
}

/** Link with its anchor text, as found on the page. */
export interface PageLink {
  text: string;
  /** Absolute URL; query and fragment kept. */
  url: string;
  /** Same hostname as the page it was found on. */
  internal: boolean;
}

export type PageBody =
  | { kind: "document"; text: string }
  | { kind: "structured"; fields: StructuredFields }
  | { kind: "links"; links: PageLink[] };

export interface PageMetadata {
  /** URL after redirects. */
  finalUrl: string;
  statusCode: number;
  contentType: string;
  /** `<meta name="description">` or `og:description`, when present. */
  description?: string;
  /** Epoch milliseconds at which the page was retrieved. */
  fetchedAt: number;
  fromCache: boolean;
}

export interface PageSuccess {
  succeeded: true;
  url: string;
  title: string;
  body: PageBody;
  /** Absolute URLs in document order. Populated in every mode. */
  outboundLinks: string[];
  metadata: PageMetadata;
}

/** Where a failed page stopped: retrieval, parsing, or its time budget. */
export type FailureStage = "fetch" | "extract" | "timeout";

export interface PageFailure {
  succeeded: false;
  url: string;
  error: string;
  /** Machine-readable error code, e.g. `FETCH_FAILED`. */
  code: string;
  stage: FailureStage;
}

export type PageResult = PageSuccess | PageFailure;

export interface FetchOptions {
  /** Best-effort cancellation of a queued or in-flight request. */
  signal?: AbortSignal;
}

/**
 * Retrieves and extracts one page.
 *
 * Implementations may either return a {@link PageFailure} or throw; the
 * {@link ExtractorDispatcher} normalizes both into a result. They must
 * resolve relative links to absolute before returning `outboundLinks`, and
 * must bound every request in time.
 */
export interface FetchClient {
  fetch(request: PageRequest, options?: FetchOptions): Promise<PageResult>;
}
