#!/usr/bin/env node
/**
 * @module index
 * @fileoverview docs-graph-mcp MCP server entry point.
 *
 * Loads configuration, wires the shared {@link ServerContext}, registers the
 * tools, resources and prompt below, then serves over stdio.
 *
 * ## Tools
 * | Tool                     | Description                                       | Module                                |
 * |--------------------------|---------------------------------------------------|---------------------------------------|
 * | `crawl_documentation`    | Fetch one page as Markdown, structure or links    | `./tools/crawl-documentation.js`      |
 * | `extend_knowledge_graph` | BFS crawl a docs site into a stored graph         | `./tools/extend-knowledge-graph.js`   |
 * | `get_knowledge_graph`    | Read one stored graph, or the index of all        | `./tools/get-knowledge-graph.js`      |
 *
 * ## Resources
 * - `knowledge-graph://index`: summary of every stored graph
 * - `knowledge-graph://{framework}`: one stored graph as JSON
 *
 * ## Prompts
 * - `analyze_framework(framework_name, documentation_url)`
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts -- McpServer
 *   |
 *   +-- crawl_documentation    --> crawler/dispatcher.ts --> extractor/http-fetch-client.ts
 *   +-- extend_knowledge_graph --> crawler/traversal.ts  --> store/graph-store.ts
 *   +-- get_knowledge_graph    --> store/graph-store.ts
 *   +-- knowledge-graph://     --> resources/knowledge-graph.ts --> store/graph-store.ts
 * ```
 */

import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createServerContext } from "./context.js";
import { createLogger } from "./logger.js";
import { AnalyzeFrameworkSchema, handleAnalyzeFramework } from "./prompts/analyze-framework.js";
import {
  GRAPH_INDEX_URI,
  GRAPH_URI_TEMPLATE,
  frameworkFromVariable,
  listGraphResources,
  readGraphIndexResource,
  readGraphResource,
} from "./resources/knowledge-graph.js";
import {
  CrawlDocumentationSchema,
  handleCrawlDocumentation,
} from "./tools/crawl-documentation.js";
import {
  ExtendKnowledgeGraphSchema,
  handleExtendKnowledgeGraph,
} from "./tools/extend-knowledge-graph.js";
import { GetKnowledgeGraphSchema, handleGetKnowledgeGraph } from "./tools/get-knowledge-graph.js";
import { formatErrorForMcp } from "./utils/errors.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const context = createServerContext(config, logger);

const server = new McpServer({
  name: "docs-graph-mcp",
  version: "1.0.0",
});

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

server.tool(
  "crawl_documentation",
  "Fetch a single documentation page. extract_type 'markdown' returns the main content as Markdown, 'structured' returns concepts, API entries and code samples, 'links' returns the page's links.",
  CrawlDocumentationSchema,
  (params, extra) => handleCrawlDocumentation(context, params, extra.signal),
);

server.tool(
  "extend_knowledge_graph",
  "Crawl a framework's documentation breadth-first from base_url, build a knowledge graph of pages (concepts, API surface, code samples) and the links between them, and store it under framework_name.",
  ExtendKnowledgeGraphSchema,
  (params, extra) => handleExtendKnowledgeGraph(context, params, extra.signal),
);

server.tool(
  "get_knowledge_graph",
  "Return the stored knowledge graph for framework_name, or a summary of every stored graph when no name is given.",
  GetKnowledgeGraphSchema,
  (params) => handleGetKnowledgeGraph(context, params),
);

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

server.resource("knowledge-graph-index", GRAPH_INDEX_URI, (uri) =>
  readGraphIndexResource(context, uri),
);

server.resource(
  "knowledge-graph",
  new ResourceTemplate(GRAPH_URI_TEMPLATE, { list: () => listGraphResources(context) }),
  (uri, variables) => readGraphResource(context, uri, frameworkFromVariable(variables.framework)),
);

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

server.prompt(
  "analyze_framework",
  "Build the knowledge graph for a framework and summarize its concepts, APIs and usage patterns.",
  AnalyzeFrameworkSchema,
  (params) => handleAnalyzeFramework(params),
);

// ---------------------------------------------------------------------------
// Startup & Shutdown
// ---------------------------------------------------------------------------

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  logger.info({ signal }, "shutting down");
  await server.close();
  await context.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    });
  });
}

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ store: config.graphStoreDir }, "docs-graph-mcp listening on stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, formatErrorForMcp(error));
  process.exit(1);
});
