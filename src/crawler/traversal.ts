/**
 * @module crawler/traversal
 * @fileoverview Breadth-first documentation traversal that builds a knowledge graph.
 *
 * ```
 * FrontierScheduler.next() ─► ExtractorDispatcher.fetch(url, "structured")
 *        ▲                               │
 *        │                               ▼
 *        │                  GraphAssembler.recordNode()
 *        │                               │  depth < requestedDepth?
 *        │                               ▼
 *        └──── offer(link, depth+1) ◄── isEligible(link) ─► recordEdge()
 * ```
 *
 * ## Stopping conditions
 * - **frontier_exhausted**: nothing left to fetch.
 * - **page_bound**: `pageBound` entries were dequeued; queued entries remain.
 * - **cancelled**: the abort signal fired. Checked before every dequeue.
 *
 * None of these is an error: the returned graph is always valid, possibly
 * partial.
 *
 * Node keys are normalized URLs (see `normalizeUrl`). Edge targets keep the
 * link exactly as found, query and fragment included; only the frontier
 * compares them in normalized form.
 *
 * ## Failures
 * A page that fails to fetch yields no node and its links are never seen.
 * Its URL stays claimed, so it is not retried within the run. The failure is
 * listed in the summary with the stage it stopped at.
 *
 * ## Concurrency
 * With `concurrency > 1`, up to that many entries *of the same depth* are
 * dequeued together and fetched in parallel. Results are folded in dequeue
 * order, so the graph is the same as a sequential run over the same site.
 */

import { GraphAssembler } from "../graph/assembler.js";
import type { KnowledgeGraph } from "../graph/types.js";
import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ExtractorDispatcher } from "./dispatcher.js";
import { FrontierScheduler } from "./frontier.js";
import type { FrontierEntry } from "./frontier.js";
import { createLinkFilter } from "./link-filter.js";
import type { FailureStage, PageResult } from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface TraversalOptions {
  framework: string;
  baseUrl: string;
  /** Maximum link distance from the base URL. */
  depth: number;
  /** Maximum pages fetched. */
  pageBound: number;
  /** Link substrings; empty or omitted selects the default set. */
  patterns?: readonly string[];
  /** Same-depth fetches in flight at once. Defaults to 1. */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface TraversalDependencies {
  dispatcher: ExtractorDispatcher;
  logger?: Logger;
}

export interface TraversalFailure {
  url: string;
  depth: number;
  stage: FailureStage;
  code: string;
  error: string;
}

export type StoppedReason = "frontier_exhausted" | "page_bound" | "cancelled";

export interface TraversalSummary {
  pages_fetched: number;
  pages_failed: number;
  nodes: number;
  relationships: number;
  /** Entries queued but never dequeued. */
  frontier_remaining: number;
  max_depth_reached: number;
  stopped_reason: StoppedReason;
  failures: TraversalFailure[];
  duration_ms: number;
  /** URLs in the order they were dequeued. */
  visit_order: string[];
}

export interface TraversalOutcome {
  graph: KnowledgeGraph;
  summary: TraversalSummary;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/** Dequeue up to `max` entries that share the depth of the head entry. */
function takeLevelBatch(frontier: FrontierScheduler, max: number): FrontierEntry[] {
  const batch: FrontierEntry[] = [];
  const depth = frontier.peekDepth();
  while (batch.length < max && depth !== null && frontier.peekDepth() === depth) {
    const entry = frontier.next();
    if (entry === null) break;
    batch.push(entry);
  }
  return batch;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Traversal
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Crawl from `options.baseUrl` and assemble the knowledge graph.
 *
 * @throws {TypeError}  When `baseUrl` is not an absolute URL.
 * @throws {RangeError} When `depth` or `pageBound` is not a non-negative integer.
 */
export async function traverse(
  options: TraversalOptions,
  deps: TraversalDependencies,
): Promise<TraversalOutcome> {
  const log = (deps.logger ?? rootLogger).child({
    component: "traversal",
    framework: options.framework,
  });
  const startedAt = Date.now();
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

  const frontier = new FrontierScheduler({
    rootUrl: options.baseUrl,
    requestedDepth: options.depth,
    pageBound: options.pageBound,
  });
  const assembler = new GraphAssembler(options.framework, options.baseUrl);
  const isEligible = createLinkFilter(options.baseUrl, options.patterns);

  const failures: TraversalFailure[] = [];
  const visitOrder: string[] = [];
  let pagesFetched = 0;
  let maxDepthReached = 0;
  let cancelled = false;

  log.info(
    { baseUrl: options.baseUrl, depth: options.depth, pageBound: options.pageBound, concurrency },
    "traversal started",
  );

  const fold = (entry: FrontierEntry, result: PageResult): void => {
    visitOrder.push(entry.url);
    maxDepthReached = Math.max(maxDepthReached, entry.depth);

    if (!result.succeeded) {
      failures.push({
        url: entry.url,
        depth: entry.depth,
        stage: result.stage,
        code: result.code,
        error: result.error,
      });
      log.warn({ url: entry.url, depth: entry.depth, stage: result.stage, err: result.error }, "page failed");
      return;
    }

    pagesFetched++;
    assembler.recordNode(entry.url, entry.depth, result);
    if (entry.depth >= options.depth) return;

    for (const link of result.outboundLinks) {
      if (!isEligible(link)) continue;
      assembler.recordEdge(entry.url, link);
      frontier.offer(link, entry.depth + 1);
    }
  };

  for (;;) {
    if (options.signal?.aborted) {
      cancelled = true;
      break;
    }

    const batch = takeLevelBatch(frontier, concurrency);
    if (batch.length === 0) break;

    const results = await Promise.all(
      batch.map((entry) => deps.dispatcher.fetch(entry.url, "structured", options.signal)),
    );
    batch.forEach((entry, index) => fold(entry, results[index]));
  }

  const graph = assembler.finalize();
  const stoppedReason: StoppedReason = cancelled
    ? "cancelled"
    : frontier.pending > 0
      ? "page_bound"
      : "frontier_exhausted";

  const summary: TraversalSummary = {
    pages_fetched: pagesFetched,
    pages_failed: failures.length,
    nodes: assembler.nodeCount,
    relationships: assembler.edgeCount,
    frontier_remaining: frontier.pending,
    max_depth_reached: maxDepthReached,
    stopped_reason: stoppedReason,
    failures,
    duration_ms: Date.now() - startedAt,
    visit_order: visitOrder,
  };

  log.info(
    {
      nodes: summary.nodes,
      relationships: summary.relationships,
      failed: summary.pages_failed,
      stoppedReason,
      durationMs: summary.duration_ms,
    },
    "traversal finished",
  );

  return { graph, summary };
}
