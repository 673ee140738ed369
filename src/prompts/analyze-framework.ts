/**
 * MCP prompt `analyze_framework`: asks the agent to crawl a framework's
 * documentation into the knowledge graph, then summarize it.
 */

import { z } from "zod";

export const AnalyzeFrameworkSchema = {
  framework_name: z.string().describe("Name of the framework to analyze"),
  documentation_url: z.string().describe("Root URL of the framework's documentation"),
};

export interface AnalyzeFrameworkParams {
  framework_name: string;
  documentation_url: string;
}

export const ANALYSIS_PATTERNS = ["/api/", "/guide/", "/tutorial/"] as const;

export function analyzeFrameworkText(params: AnalyzeFrameworkParams): string {
  return [
    `Please analyze the ${params.framework_name} framework by:`,
    "",
    "1. First, use the extend_knowledge_graph tool with these parameters:",
    `   - framework_name: ${JSON.stringify(params.framework_name)}`,
    `   - base_url: ${JSON.stringify(params.documentation_url)}`,
    "   - depth: 2",
    `   - patterns: ${JSON.stringify(ANALYSIS_PATTERNS)}`,
    "",
    "2. Then, summarize:",
    "   - Core concepts and architecture",
    "   - Main APIs and their purposes",
    "   - Common usage patterns",
    "   - Integration points with other tools",
    "",
    "3. Finally, suggest how this framework could be useful in the current project.",
  ].join("\n");
}

export function handleAnalyzeFramework(params: AnalyzeFrameworkParams) {
  return {
    messages: [
      {
        role: "user" as const,
        content: { type: "text" as const, text: analyzeFrameworkText(params) },
      },
    ],
  };
}
