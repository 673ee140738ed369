/**
 * Runtime validation for graphs read back from storage.
 */
import { z } from "zod";

const ApiEntrySchema = z.object({
  name: z.string(),
  description: z.string(),
});

const GraphNodeSchema = z.object({
  url: z.string(),
  title: z.string(),
  concepts: z.array(z.string()),
  api_surface: z.array(ApiEntrySchema),
  code_samples: z.array(z.string()).default([]),
  depth: z.number().int().nonnegative(),
});

const GraphEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  type: z.literal("references"),
});

const KnowledgeGraphSchema = z.object({
  framework: z.string(),
  base_url: z.string(),
  nodes: z.record(GraphNodeSchema),
  relationships: z.array(GraphEdgeSchema),
});

/** On-disk envelope: the graph plus the moment it was written. */
export const StoredGraphSchema = z.object({
  saved_at: z.string().datetime(),
  graph: KnowledgeGraphSchema,
});

export type StoredGraph = z.infer<typeof StoredGraphSchema>;
