/**
 * @module tools/extend-knowledge-graph
 * @fileoverview MCP tool `extend_knowledge_graph`: crawl a documentation site
 * breadth-first and store the resulting graph under the framework name.
 *
 * ## Response
 * ```json
 * { "success": true, "graph": { ... }, "summary": { ... }, "store": { "saved": true } }
 * ```
 *
 * A store failure does not fail the crawl: the graph is still returned and
 * `store` carries `{ saved: false, error }`. A cancelled crawl returns its
 * partial graph and is not saved.
 */

import { z } from "zod";
import type { ServerContext } from "../context.js";
import { traverse } from "../crawler/traversal.js";
import type { TraversalOutcome, TraversalSummary } from "../crawler/traversal.js";
import type { KnowledgeGraph } from "../graph/types.js";
import { errorDetails, toToolResponse } from "./response.js";
import type { ErrorDetails } from "./response.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

export const MAX_DEPTH = 10;
export const MAX_PAGE_BOUND = 500;

export const ExtendKnowledgeGraphSchema = {
  framework_name: z
    .string()
    .min(1)
    .describe("Name the graph is stored under, e.g. 'fastify'"),
  base_url: z.string().url().describe("Root URL of the framework's documentation"),
  depth: z
    .number()
    .int()
    .min(0)
    .max(MAX_DEPTH)
    .optional()
    .describe("Maximum link distance from base_url (default: 2)"),
  patterns: z
    .array(z.string())
    .optional()
    .describe("URL substrings a link must contain to be followed (default: /api/, /guide/, /docs/, /reference/, /tutorial/)"),
  page_bound: z
    .number()
    .int()
    .min(0)
    .max(MAX_PAGE_BOUND)
    .optional()
    .describe("Maximum number of pages fetched (default: 50)"),
};

export interface ExtendKnowledgeGraphParams {
  framework_name: string;
  base_url: string;
  depth?: number;
  patterns?: string[];
  page_bound?: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Result
 * ──────────────────────────────────────────────────────────────────────────── */

export interface StoreOutcome {
  saved: boolean;
  error?: ErrorDetails;
}

export type ExtendKnowledgeGraphResult =
  | {
      success: true;
      graph: KnowledgeGraph;
      summary: TraversalSummary;
      store: StoreOutcome;
    }
  | {
      success: false;
      framework: string;
      error: ErrorDetails;
    };

/* ────────────────────────────────────────────────────────────────────────────
 * Operation & Handler
 * ──────────────────────────────────────────────────────────────────────────── */

export async function extendKnowledgeGraph(
  context: ServerContext,
  params: ExtendKnowledgeGraphParams,
  signal?: AbortSignal,
): Promise<ExtendKnowledgeGraphResult> {
  const { config, dispatcher, store, logger } = context;

  let outcome: TraversalOutcome;
  try {
    outcome = await traverse(
      {
        framework: params.framework_name,
        baseUrl: params.base_url,
        depth: params.depth ?? config.defaultDepth,
        pageBound: params.page_bound ?? config.defaultPageBound,
        patterns: params.patterns,
        concurrency: config.crawlConcurrency,
        signal,
      },
      { dispatcher, logger },
    );
  } catch (error) {
    logger.error({ err: error, framework: params.framework_name }, "traversal aborted");
    return {
      success: false,
      framework: params.framework_name,
      error: errorDetails(error, "traversal", params.base_url),
    };
  }

  const { graph, summary } = outcome;
  if (summary.stopped_reason === "cancelled") {
    return { success: true, graph, summary, store: { saved: false } };
  }

  try {
    await store.save(graph);
    return { success: true, graph, summary, store: { saved: true } };
  } catch (error) {
    logger.error({ err: error, framework: params.framework_name }, "graph not saved");
    return {
      success: true,
      graph,
      summary,
      store: { saved: false, error: errorDetails(error, "store") },
    };
  }
}

export async function handleExtendKnowledgeGraph(
  context: ServerContext,
  params: ExtendKnowledgeGraphParams,
  signal?: AbortSignal,
) {
  return toToolResponse(await extendKnowledgeGraph(context, params, signal));
}
