/**
 * @module tools/get-knowledge-graph
 * @fileoverview MCP tool `get_knowledge_graph`: read back stored graphs.
 *
 * With `framework_name`, returns that framework's graph (an empty graph when
 * it was never crawled). Without it, returns an index of every stored graph.
 */

import { z } from "zod";
import type { ServerContext } from "../context.js";
import { emptyGraph } from "../graph/assembler.js";
import type { KnowledgeGraph } from "../graph/types.js";
import type { GraphStore, StoredGraphSummary } from "../store/graph-store.js";
import { errorDetails, toToolResponse } from "./response.js";
import type { ErrorDetails } from "./response.js";

export const GetKnowledgeGraphSchema = {
  framework_name: z
    .string()
    .min(1)
    .optional()
    .describe("Framework to return; omit to list every stored graph"),
};

export interface GetKnowledgeGraphParams {
  framework_name?: string;
}

export interface GraphIndex {
  frameworks: StoredGraphSummary[];
  total_nodes: number;
  /** `saved_at` of the most recent save, or `null` when nothing is stored. */
  last_updated: string | null;
}

export type GetKnowledgeGraphResult =
  | { success: true; graph: KnowledgeGraph }
  | ({ success: true } & GraphIndex)
  | { success: false; error: ErrorDetails };

/** Summary of everything in `store`; shared with the index resource. */
export async function buildGraphIndex(store: GraphStore): Promise<GraphIndex> {
  const frameworks = await store.list();
  return {
    frameworks,
    total_nodes: frameworks.reduce((sum, entry) => sum + entry.nodes, 0),
    last_updated: frameworks[0]?.saved_at ?? null,
  };
}

export async function getKnowledgeGraph(
  store: GraphStore,
  params: GetKnowledgeGraphParams,
): Promise<GetKnowledgeGraphResult> {
  try {
    if (params.framework_name === undefined) {
      return { success: true, ...(await buildGraphIndex(store)) };
    }
    const graph = await store.load(params.framework_name);
    return { success: true, graph: graph ?? emptyGraph(params.framework_name) };
  } catch (error) {
    return { success: false, error: errorDetails(error, "store") };
  }
}

export async function handleGetKnowledgeGraph(
  context: ServerContext,
  params: GetKnowledgeGraphParams,
) {
  const result = await getKnowledgeGraph(context.store, params);
  if (!result.success) {
    context.logger.error({ framework: params.framework_name, error: result.error }, "graph read failed");
  }
  return toToolResponse(result);
}
