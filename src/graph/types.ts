/**
 * @module graph/types
 * @fileoverview Knowledge graph model.
 *
 * These types double as the JSON wire format returned by the MCP tools and
 * written by the graph store, hence the snake_case field names.
 *
 * ```json
 * {
 *   "framework": "vite",
 *   "base_url": "https://ex.org/docs",
 *   "nodes": { "https://ex.org/docs": { "title": "...", "depth": 0, ... } },
 *   "relationships": [{ "from": "...", "to": "...", "type": "references" }]
 * }
 * ```
 */

import type { ApiEntry } from "../crawler/types.js";

export interface GraphNode {
  /** Unique key; equal to the key of this node in {@link KnowledgeGraph.nodes}. */
  url: string;
  title: string;
  /** Distinct concept names, in first-seen order. */
  concepts: string[];
  api_surface: ApiEntry[];
  code_samples: string[];
  /** Frontier depth at which the URL was first offered. */
  depth: number;
}

export type RelationKind = "references";

export interface GraphEdge {
  from: string;
  /**
   * Target URL as linked, query and fragment kept. Its node, if any, is keyed
   * by the normalized form. Has no node when the target failed or lay past
   * the page bound.
   */
  to: string;
  type: RelationKind;
}

export interface KnowledgeGraph {
  framework: string;
  base_url: string;
  nodes: Record<string, GraphNode>;
  relationships: GraphEdge[];
}
