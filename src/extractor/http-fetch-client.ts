/**
 * @module extractor/http-fetch-client
 * @fileoverview The production {@link FetchClient}: HTTP retrieval plus
 * HTML extraction in each of the three modes.
 *
 * ```
 * safeFetch ──► html ──┬─► extractLinks (raw html) ─────────► outboundLinks
 *                      ├─► document:   extractFromHtml ─► htmlToMarkdown
 *                      ├─► structured: extractStructured
 *                      └─► links:      the link list itself
 * ```
 *
 * Retrieval failures propagate as the errors thrown by `safeFetch`;
 * anything that goes wrong after the body was read is wrapped in an
 * {@link ExtractionError}. The dispatcher turns both into failed results.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { AppConfig } from "../config.js";
import type {
  FetchClient,
  FetchOptions,
  PageBody,
  PageLink,
  PageRequest,
  PageResult,
} from "../crawler/types.js";
import { extractLinks } from "../crawler/link-resolver.js";
import { safeFetch } from "../services/fetch.js";
import type { FetchResult } from "../services/fetch.js";
import { QueueManager } from "../services/queue.js";
import { ExtractionError, errorMessage } from "../utils/errors.js";
import { extractDescription, extractDocumentTitle, extractFromHtml } from "./html-extractor.js";
import { htmlToMarkdown } from "./markdown-converter.js";
import { extractStructured } from "./structured-extractor.js";

export interface HttpFetchClientOptions {
  timeoutMs: number;
  maxResponseSize: number;
  userAgent: string;
  allowPrivateNetwork: boolean;
  maxConcurrent: number;
  perDomainInterval: number;
}

export function httpFetchClientOptions(config: AppConfig): HttpFetchClientOptions {
  return {
    timeoutMs: config.fetchTimeout,
    maxResponseSize: config.maxResponseSize,
    userAgent: config.userAgent,
    allowPrivateNetwork: config.allowPrivateNetwork,
    maxConcurrent: config.maxConcurrent,
    perDomainInterval: config.perDomainInterval,
  };
}

interface Extracted {
  title: string;
  body: PageBody;
}

function extractBody(
  page: FetchResult,
  request: PageRequest,
  $: CheerioAPI,
  links: PageLink[],
): Extracted {
  switch (request.mode) {
    case "document": {
      const article = extractFromHtml(page.html, page.url);
      return {
        title: article.title,
        body: { kind: "document", text: htmlToMarkdown(article.content) },
      };
    }
    case "structured": {
      const { title, fields } = extractStructured(page.html);
      return { title, body: { kind: "structured", fields } };
    }
    case "links":
      return {
        title: extractDocumentTitle($),
        body: { kind: "links", links },
      };
  }
}

export class HttpFetchClient implements FetchClient {
  private readonly options: HttpFetchClientOptions;
  private readonly queue: QueueManager;

  constructor(options: HttpFetchClientOptions) {
    this.options = options;
    this.queue = new QueueManager({
      maxConcurrent: options.maxConcurrent,
      perDomainInterval: options.perDomainInterval,
    });
  }

  /**
   * @throws {DocsGraphError} Any retrieval error from `safeFetch`, or an
   *   {@link ExtractionError} when the HTML cannot be processed.
   */
  async fetch(request: PageRequest, options: FetchOptions = {}): Promise<PageResult> {
    const page = await safeFetch(request.url, {
      queue: this.queue,
      timeoutMs: this.options.timeoutMs,
      maxResponseSize: this.options.maxResponseSize,
      userAgent: this.options.userAgent,
      allowPrivateNetwork: this.options.allowPrivateNetwork,
      signal: options.signal,
    });

    let links: PageLink[];
    let extracted: Extracted;
    let description: string | undefined;
    try {
      const $ = cheerio.load(page.html);
      links = extractLinks($, page.url);
      description = extractDescription($);
      extracted = extractBody(page, request, $, links);
    } catch (error) {
      throw new ExtractionError(
        `Could not extract ${request.mode} content from ${page.url}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    return {
      succeeded: true,
      url: request.url,
      title: extracted.title,
      body: extracted.body,
      outboundLinks: links.map((link) => link.url),
      metadata: {
        finalUrl: page.url,
        statusCode: page.statusCode,
        contentType: page.contentType,
        description,
        fetchedAt: Date.now(),
        fromCache: false,
      },
    };
  }

  /** Wait for queued requests to settle. */
  close(): Promise<void> {
    return this.queue.drain();
  }
}
