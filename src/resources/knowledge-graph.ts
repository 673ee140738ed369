/**
 * @module resources/knowledge-graph
 * @fileoverview MCP resources over the graph store.
 *
 * - `knowledge-graph://index`: {@link GraphIndex} of every stored graph.
 * - `knowledge-graph://{framework}`: one graph, empty when never crawled.
 *
 * A store failure is logged and served as a `{ success: false, error }`
 * body with stage `store`, the same payload `get_knowledge_graph` returns.
 */

import type { ServerContext } from "../context.js";
import { emptyGraph } from "../graph/assembler.js";
import { buildGraphIndex } from "../tools/get-knowledge-graph.js";
import type { GraphIndex } from "../tools/get-knowledge-graph.js";
import { errorDetails } from "../tools/response.js";

export const GRAPH_INDEX_URI = "knowledge-graph://index";
export const GRAPH_URI_TEMPLATE = "knowledge-graph://{framework}";

type ResourceContents = {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
};

function jsonContents(uri: URL, body: unknown): ResourceContents {
  return {
    contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(body, null, 2) }],
  };
}

async function readOrReport(
  context: ServerContext,
  uri: URL,
  framework: string | undefined,
  read: () => Promise<unknown>,
): Promise<ResourceContents> {
  try {
    return jsonContents(uri, await read());
  } catch (error) {
    const details = errorDetails(error, "store");
    context.logger.error({ uri: uri.href, framework, error: details }, "graph resource read failed");
    return jsonContents(uri, { success: false, error: details });
  }
}

export function graphUri(framework: string): string {
  return `knowledge-graph://${encodeURIComponent(framework)}`;
}

/** Framework name from a matched `{framework}` template variable. */
export function frameworkFromVariable(raw: string | string[]): string {
  return decodeURIComponent(Array.isArray(raw) ? raw.join("/") : raw);
}

export function readGraphIndexResource(context: ServerContext, uri: URL): Promise<ResourceContents> {
  return readOrReport(context, uri, undefined, (): Promise<GraphIndex> => buildGraphIndex(context.store));
}

export function readGraphResource(
  context: ServerContext,
  uri: URL,
  framework: string,
): Promise<ResourceContents> {
  return readOrReport(
    context,
    uri,
    framework,
    async () => (await context.store.load(framework)) ?? emptyGraph(framework),
  );
}

/**
 * Resource listing for the graph template.
 *
 * @throws {StoreError} After logging it, when the store cannot be listed.
 */
export async function listGraphResources(context: ServerContext) {
  try {
    const stored = await context.store.list();
    return {
      resources: stored.map((entry) => ({
        uri: graphUri(entry.framework),
        name: entry.framework,
        description: `${entry.nodes} pages from ${entry.base_url}`,
        mimeType: "application/json",
      })),
    };
  } catch (error) {
    context.logger.error({ error: errorDetails(error, "store") }, "graph resource listing failed");
    throw error;
  }
}
