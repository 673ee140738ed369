/**
 * @module graph/assembler
 * @fileoverview Folds page results into a {@link KnowledgeGraph}.
 *
 * One assembler serves exactly one traversal:
 *
 * - `recordNode` turns a successful result into a node; failed results are
 *   ignored (their URL stays visited in the frontier, so they are not
 *   retried).
 * - `recordEdge` appends a `references` edge; duplicates are kept, since a
 *   page may link to the same target more than once.
 * - `finalize` returns the graph deep-frozen. Any later call throws.
 */

import type { PageResult } from "../crawler/types.js";
import { GraphAssemblyError } from "../utils/errors.js";
import type { GraphEdge, GraphNode, KnowledgeGraph } from "./types.js";

export class GraphAssembler {
  private readonly framework: string;
  private readonly baseUrl: string;
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges: GraphEdge[] = [];
  private finalized = false;

  constructor(framework: string, baseUrl: string) {
    this.framework = framework;
    this.baseUrl = baseUrl;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  private assertOpen(operation: string): void {
    if (this.finalized) {
      throw new GraphAssemblyError(`${operation} called after finalize()`);
    }
  }

  /**
   * Create the node for `url` from a structured result.
   *
   * Concepts are de-duplicated keeping first-seen order. A result whose body
   * is not structured still yields a node, with empty lists.
   *
   * @returns The new node, or `undefined` for a failed result.
   * @throws {GraphAssemblyError} When `url` already has a node.
   */
  recordNode(url: string, depth: number, result: PageResult): GraphNode | undefined {
    this.assertOpen("recordNode");
    if (!result.succeeded) return undefined;

    if (this.nodes.has(url)) {
      throw new GraphAssemblyError(`Node already recorded for ${url}`);
    }

    const fields = result.body.kind === "structured" ? result.body.fields : undefined;
    const node: GraphNode = {
      url,
      title: result.title,
      concepts: [...new Set(fields?.concepts ?? [])],
      api_surface: (fields?.apiSurface ?? []).map((entry) => ({ ...entry })),
      code_samples: [...(fields?.codeSamples ?? [])],
      depth,
    };
    this.nodes.set(url, node);
    return node;
  }

  recordEdge(from: string, to: string): void {
    this.assertOpen("recordEdge");
    this.edges.push({ from, to, type: "references" });
  }

  finalize(): KnowledgeGraph {
    this.assertOpen("finalize");
    this.finalized = true;

    return freezeGraph({
      framework: this.framework,
      base_url: this.baseUrl,
      nodes: Object.fromEntries(this.nodes),
      relationships: this.edges,
    });
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function freezeGraph(graph: KnowledgeGraph): KnowledgeGraph {
  for (const node of Object.values(graph.nodes)) {
    node.api_surface.forEach((entry) => Object.freeze(entry));
    Object.freeze(node.api_surface);
    Object.freeze(node.concepts);
    Object.freeze(node.code_samples);
    Object.freeze(node);
  }
  graph.relationships.forEach((edge) => Object.freeze(edge));
  Object.freeze(graph.relationships);
  Object.freeze(graph.nodes);
  return Object.freeze(graph);
}

/** Graph with no nodes or edges, e.g. for a framework never crawled. */
export function emptyGraph(framework: string, baseUrl = ""): KnowledgeGraph {
  return { framework, base_url: baseUrl, nodes: {}, relationships: [] };
}

export function countNodes(graph: KnowledgeGraph): number {
  return Object.keys(graph.nodes).length;
}
