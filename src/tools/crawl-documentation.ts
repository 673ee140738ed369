/**
 * @module tools/crawl-documentation
 * @fileoverview MCP tool `crawl_documentation`: fetch one page, no traversal.
 *
 * `extract_type` selects the shape of the answer:
 *
 * | extract_type | payload field | contents                                   |
 * |--------------|---------------|--------------------------------------------|
 * | markdown     | `content`     | main page content as Markdown              |
 * | structured   | `content`     | `{ concepts, api_surface, code_samples }`  |
 * | links        | `links`       | `[{ text, url, internal }]`                |
 *
 * `links` mode also returns `outbound_links`, the plain URL list the
 * traversal follows.
 */

import { z } from "zod";
import type { ExtractorDispatcher } from "../crawler/dispatcher.js";
import type { ApiEntry, ExtractionMode, PageResult } from "../crawler/types.js";
import type { ServerContext } from "../context.js";
import { errorDetails, toToolResponse } from "./response.js";
import type { ErrorDetails } from "./response.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

export const EXTRACT_TYPES = ["markdown", "structured", "links"] as const;

export type ExtractType = (typeof EXTRACT_TYPES)[number];

const MODE_BY_EXTRACT_TYPE: Record<ExtractType, ExtractionMode> = {
  markdown: "document",
  structured: "structured",
  links: "links",
};

export const CrawlDocumentationSchema = {
  url: z.string().url().describe("URL of the documentation page to fetch"),
  extract_type: z
    .enum(EXTRACT_TYPES)
    .default("markdown")
    .describe(
      "'markdown' for the page text, 'structured' for concepts, API surface and code samples, " +
        "'links' for the page's outbound links",
    ),
};

export interface CrawlDocumentationParams {
  url: string;
  extract_type: ExtractType;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Result
 * ──────────────────────────────────────────────────────────────────────────── */

export interface StructuredContent {
  concepts: string[];
  api_surface: ApiEntry[];
  code_samples: string[];
}

export interface PageMetadataView {
  final_url: string;
  status_code: number;
  content_type: string;
  description?: string;
  fetched_at: string;
  from_cache: boolean;
  outbound_link_count: number;
}

export type CrawlDocumentationResult =
  | {
      success: true;
      url: string;
      title: string;
      content?: string | StructuredContent;
      links?: Array<{ text: string; url: string; internal: boolean }>;
      outbound_links?: string[];
      metadata: PageMetadataView;
    }
  | {
      success: false;
      url: string;
      error: ErrorDetails;
    };

function toResult(result: PageResult): CrawlDocumentationResult {
  if (!result.succeeded) {
    return {
      success: false,
      url: result.url,
      error: {
        code: result.code,
        message: result.error,
        stage: result.stage,
        url: result.url,
      },
    };
  }

  const metadata: PageMetadataView = {
    final_url: result.metadata.finalUrl,
    status_code: result.metadata.statusCode,
    content_type: result.metadata.contentType,
    description: result.metadata.description,
    fetched_at: new Date(result.metadata.fetchedAt).toISOString(),
    from_cache: result.metadata.fromCache,
    outbound_link_count: result.outboundLinks.length,
  };
  const base = { success: true as const, url: result.url, title: result.title, metadata };

  switch (result.body.kind) {
    case "document":
      return { ...base, content: result.body.text };
    case "structured":
      return {
        ...base,
        content: {
          concepts: result.body.fields.concepts,
          api_surface: result.body.fields.apiSurface,
          code_samples: result.body.fields.codeSamples,
        },
      };
    case "links":
      return { ...base, links: result.body.links, outbound_links: result.outboundLinks };
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Operation & Handler
 * ──────────────────────────────────────────────────────────────────────────── */

/** Fetch one page in the requested shape. Never rejects. */
export async function crawlDocumentation(
  dispatcher: ExtractorDispatcher,
  params: CrawlDocumentationParams,
  signal?: AbortSignal,
): Promise<CrawlDocumentationResult> {
  const result = await dispatcher.fetch(params.url, MODE_BY_EXTRACT_TYPE[params.extract_type], signal);
  return toResult(result);
}

export async function handleCrawlDocumentation(
  context: ServerContext,
  params: CrawlDocumentationParams,
  signal?: AbortSignal,
) {
  try {
    return toToolResponse(await crawlDocumentation(context.dispatcher, params, signal));
  } catch (error) {
    context.logger.error({ err: error, url: params.url }, "crawl_documentation failed");
    return toToolResponse({
      success: false,
      url: params.url,
      error: errorDetails(error, "fetch", params.url),
    });
  }
}
