/**
 * In-process documentation site for traversal and tool tests.
 *
 * Pages are keyed by normalized URL. A request for an unknown page throws a
 * 404 `FetchError`, the way the HTTP client does.
 */

import type {
  ApiEntry,
  FetchClient,
  FetchOptions,
  PageBody,
  PageRequest,
  PageResult,
} from "../../src/crawler/types.js";
import { FetchError } from "../../src/utils/errors.js";
import { normalizeUrl } from "../../src/utils/url.js";

export interface FakePage {
  title?: string;
  links?: string[];
  concepts?: string[];
  apiSurface?: ApiEntry[];
  codeSamples?: string[];
  /** Throw this instead of answering. */
  fail?: Error;
  /** Answer after this many milliseconds. */
  delayMs?: number;
}

export interface FakeSiteOptions {
  /** Called with each requested URL before it is answered. */
  onFetch?: (url: string) => void;
}

function bodyFor(request: PageRequest, page: FakePage): PageBody {
  switch (request.mode) {
    case "document":
      return { kind: "document", text: `# ${page.title ?? ""}` };
    case "structured":
      return {
        kind: "structured",
        fields: {
          concepts: page.concepts ?? [],
          apiSurface: page.apiSurface ?? [],
          codeSamples: page.codeSamples ?? [],
        },
      };
    case "links":
      return {
        kind: "links",
        links: (page.links ?? []).map((url) => ({ text: url, url, internal: true })),
      };
  }
}

export class FakeSite implements FetchClient {
  readonly requests: PageRequest[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  private readonly pages = new Map<string, FakePage>();
  private readonly onFetch?: (url: string) => void;

  constructor(pages: Record<string, FakePage>, options: FakeSiteOptions = {}) {
    for (const [url, page] of Object.entries(pages)) {
      this.pages.set(normalizeUrl(url), page);
    }
    this.onFetch = options.onFetch;
  }

  get fetchedUrls(): string[] {
    return this.requests.map((request) => request.url);
  }

  async fetch(request: PageRequest, options: FetchOptions = {}): Promise<PageResult> {
    this.requests.push(request);
    this.signals.push(options.signal);
    this.onFetch?.(request.url);

    const page = this.pages.get(normalizeUrl(request.url));
    if (page?.delayMs !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, page.delayMs));
    }
    if (page === undefined) {
      throw new FetchError(`HTTP 404 for ${request.url}`, 404);
    }
    if (page.fail) throw page.fail;

    return {
      succeeded: true,
      url: request.url,
      title: page.title ?? request.url,
      body: bodyFor(request, page),
      outboundLinks: page.links ?? [],
      metadata: {
        finalUrl: request.url,
        statusCode: 200,
        contentType: "text/html; charset=utf-8",
        fetchedAt: Date.UTC(2024, 0, 2, 3, 4, 5),
        fromCache: false,
      },
    };
  }
}

/** `count` pages under `https://ex.org/docs`, each linking to all the others. */
export function meshSite(count: number): Record<string, FakePage> {
  const urls = [
    "https://ex.org/docs",
    ...Array.from({ length: count - 1 }, (_, i) => `https://ex.org/docs/api/p${i + 1}`),
  ];
  return Object.fromEntries(
    urls.map((url) => [url, { title: url, links: urls.filter((other) => other !== url) }]),
  );
}
