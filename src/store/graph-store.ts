/**
 * @module store/graph-store
 * @fileoverview Durable storage of knowledge graphs, one per framework.
 *
 * A save always replaces the whole graph. {@link FileGraphStore} writes the
 * new JSON to a temporary file in the same directory and renames it over the
 * old one, so a reader sees either the previous graph or the new one, never
 * a partial file.
 *
 * Every failure (I/O, malformed JSON, schema mismatch) surfaces as a
 * {@link StoreError}.
 */

import { createHash, randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { StoredGraphSchema } from "../graph/schema.js";
import type { StoredGraph } from "../graph/schema.js";
import type { KnowledgeGraph } from "../graph/types.js";
import { StoreError, errorMessage } from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Interface
 * ──────────────────────────────────────────────────────────────────────────── */

export interface StoredGraphSummary {
  framework: string;
  base_url: string;
  nodes: number;
  relationships: number;
  /** ISO-8601 timestamp of the last save. */
  saved_at: string;
}

export interface GraphStore {
  /** Replace the stored graph for `graph.framework`. */
  save(graph: KnowledgeGraph): Promise<void>;
  /** The stored graph, or `null` when the framework was never saved. */
  load(framework: string): Promise<KnowledgeGraph | null>;
  /** One summary per stored framework, most recently saved first. */
  list(): Promise<StoredGraphSummary[]>;
}

function summarize(stored: StoredGraph): StoredGraphSummary {
  return {
    framework: stored.graph.framework,
    base_url: stored.graph.base_url,
    nodes: Object.keys(stored.graph.nodes).length,
    relationships: stored.graph.relationships.length,
    saved_at: stored.saved_at,
  };
}

function byMostRecent(a: StoredGraphSummary, b: StoredGraphSummary): number {
  return b.saved_at.localeCompare(a.saved_at);
}

/**
 * File-system-safe name for a framework: lowercase, runs of anything other
 * than `[a-z0-9._-]` collapsed to `-`. Several names can share a slug.
 *
 * @example
 * ```ts
 * frameworkSlug("Next.js App Router"); // "next.js-app-router"
 * ```
 */
export function frameworkSlug(framework: string): string {
  const slug = framework
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[-.]+|-+$/g, "");
  return slug || "unnamed";
}

/**
 * Storage key of a framework: its slug plus a short digest of the exact
 * trimmed name, so `"C"` and `"C++"` never share a key.
 */
export function frameworkKey(framework: string): string {
  const name = framework.trim();
  const digest = createHash("sha256").update(name).digest("hex").slice(0, 12);
  return `${frameworkSlug(name)}-${digest}`;
}

function isGraphOf(stored: StoredGraph, framework: string): boolean {
  return stored.graph.framework.trim() === framework.trim();
}

/* ────────────────────────────────────────────────────────────────────────────
 * File-backed Store
 * ──────────────────────────────────────────────────────────────────────────── */

const FILE_SUFFIX = ".graph.json";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileGraphStore implements GraphStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  private pathFor(framework: string): string {
    return join(this.dir, `${frameworkKey(framework)}${FILE_SUFFIX}`);
  }

  async save(graph: KnowledgeGraph): Promise<void> {
    const target = this.pathFor(graph.framework);
    const temp = `${target}.${randomUUID()}.tmp`;
    const stored: StoredGraph = { saved_at: new Date().toISOString(), graph };

    let tempMayExist = false;
    try {
      await mkdir(this.dir, { recursive: true });
      tempMayExist = true;
      await writeFile(temp, `${JSON.stringify(stored, null, 2)}\n`, "utf8");
      await rename(temp, target);
    } catch (error) {
      if (tempMayExist) await rm(temp, { force: true });
      throw new StoreError(
        `Could not save graph for '${graph.framework}' to ${target}: ${errorMessage(error)}`,
        graph.framework,
        { cause: error },
      );
    }
  }

  async load(framework: string): Promise<KnowledgeGraph | null> {
    const stored = await this.readStored(this.pathFor(framework), framework);
    return stored !== null && isGraphOf(stored, framework) ? stored.graph : null;
  }

  async list(): Promise<StoredGraphSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new StoreError(`Could not list ${this.dir}: ${errorMessage(error)}`, "*", {
        cause: error,
      });
    }

    const summaries: StoredGraphSummary[] = [];
    for (const entry of entries.filter((name) => name.endsWith(FILE_SUFFIX)).sort()) {
      const stored = await this.readStored(join(this.dir, entry), entry);
      if (stored) summaries.push(summarize(stored));
    }
    return summaries.sort(byMostRecent);
  }

  private async readStored(path: string, framework: string): Promise<StoredGraph | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new StoreError(`Could not read ${path}: ${errorMessage(error)}`, framework, {
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Corrupt graph file ${path}: ${errorMessage(error)}`, framework, {
        cause: error,
      });
    }

    const parsed = StoredGraphSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(
        `Graph file ${path} does not match the expected shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        framework,
      );
    }
    return parsed.data;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * In-memory Store
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Process-local store. Graphs are kept as JSON text so that callers never
 * share object identity with what is stored.
 */
export class MemoryGraphStore implements GraphStore {
  private readonly graphs = new Map<string, string>();

  async save(graph: KnowledgeGraph): Promise<void> {
    const stored: StoredGraph = { saved_at: new Date().toISOString(), graph };
    this.graphs.set(frameworkKey(graph.framework), JSON.stringify(stored));
  }

  async load(framework: string): Promise<KnowledgeGraph | null> {
    const stored = this.read(frameworkKey(framework));
    return stored !== undefined && isGraphOf(stored, framework) ? stored.graph : null;
  }

  async list(): Promise<StoredGraphSummary[]> {
    const summaries: StoredGraphSummary[] = [];
    for (const key of this.graphs.keys()) {
      const stored = this.read(key);
      if (stored) summaries.push(summarize(stored));
    }
    return summaries.sort(byMostRecent);
  }

  private read(key: string): StoredGraph | undefined {
    const raw = this.graphs.get(key);
    return raw === undefined ? undefined : StoredGraphSchema.parse(JSON.parse(raw));
  }
}

/** `:memory:` selects {@link MemoryGraphStore}; anything else is a directory. */
export function createGraphStore(location: string): GraphStore {
  return location === ":memory:" ? new MemoryGraphStore() : new FileGraphStore(location);
}
