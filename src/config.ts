/**
 * @module config
 * @fileoverview Application configuration loaded from environment variables.
 *
 * Every setting has a default, so the server starts with no environment at
 * all. `index.ts` builds the config and hands it down to the components
 * that need it; the default logger in `logger.ts` loads it for its level.
 * `loadConfig` is the only reader of `process.env`.
 *
 * ## Environment variables
 * | Variable                | Field               | Default                       |
 * |-------------------------|---------------------|-------------------------------|
 * | `FETCH_TIMEOUT`         | fetchTimeout        | 10000 (ms)                    |
 * | `MAX_RESPONSE_SIZE`     | maxResponseSize     | 10485760 (bytes)              |
 * | `MAX_CONCURRENT`        | maxConcurrent       | 3                             |
 * | `PER_DOMAIN_INTERVAL`   | perDomainInterval   | 500 (ms)                      |
 * | `USER_AGENT`            | userAgent           | `docs-graph-mcp/1.0 (...)`    |
 * | `CACHE_TTL`             | cacheTtl            | 3600 (s)                      |
 * | `CACHE_MAX_KEYS`        | cacheMaxKeys        | 500                           |
 * | `DEFAULT_DEPTH`         | defaultDepth        | 2                             |
 * | `PAGE_BOUND`            | defaultPageBound    | 50                            |
 * | `CRAWL_CONCURRENCY`     | crawlConcurrency    | 1                             |
 * | `ALLOW_PRIVATE_NETWORK` | allowPrivateNetwork | false                         |
 * | `GRAPH_STORE_DIR`       | graphStoreDir       | `~/.docs-graph-mcp/graphs`    |
 * | `LOG_LEVEL`             | logLevel            | `info`                        |
 *
 * Numeric values are parsed with `parseInt(..., 10)`; a value that does not
 * parse to a non-negative integer falls back to the default.
 *
 * @example
 * ```ts
 * const config = loadConfig({ ...process.env, PAGE_BOUND: "20" });
 * config.defaultPageBound; // 20
 * ```
 */

import { homedir } from "node:os";
import { join } from "node:path";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

export interface AppConfig {
  /** Per-request HTTP timeout in milliseconds. */
  fetchTimeout: number;

  /** Maximum response body size in bytes; enforced while streaming. */
  maxResponseSize: number;

  /** Maximum number of outbound requests in flight across all domains. */
  maxConcurrent: number;

  /**
   * Minimum spacing between two requests to the same host, in milliseconds.
   *
   * Documentation sites are usually a single host, so this is effectively
   * the crawl delay for a whole traversal.
   */
  perDomainInterval: number;

  /** User-Agent header sent with every request. */
  userAgent: string;

  /** Page cache freshness window, in seconds. */
  cacheTtl: number;

  /** Page cache capacity. */
  cacheMaxKeys: number;

  /** Depth used by `extend_knowledge_graph` when the caller omits one. */
  defaultDepth: number;

  /** Maximum pages fetched by one traversal when the caller omits a bound. */
  defaultPageBound: number;

  /**
   * Number of same-level frontier entries fetched in parallel.
   * `1` keeps the traversal strictly sequential.
   */
  crawlConcurrency: number;

  /**
   * Permit hosts that resolve to loopback or private ranges, for
   * documentation served on a local network.
   */
  allowPrivateNetwork: boolean;

  /**
   * Directory holding one JSON file per framework graph.
   * The value `:memory:` selects the in-memory store.
   */
  graphStoreDir: string;

  /** pino log level. */
  logLevel: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  return raw === "true" || raw === "1" || raw === "yes";
}

/**
 * Build a complete {@link AppConfig} from an environment map.
 *
 * Pure: reads only the `env` argument, so tests can pass a plain object.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    fetchTimeout: readInt(env, "FETCH_TIMEOUT", 10_000),
    maxResponseSize: readInt(env, "MAX_RESPONSE_SIZE", 10 * 1024 * 1024),
    maxConcurrent: Math.max(1, readInt(env, "MAX_CONCURRENT", 3)),
    perDomainInterval: readInt(env, "PER_DOMAIN_INTERVAL", 500),
    userAgent: env.USER_AGENT ?? "docs-graph-mcp/1.0 (MCP documentation crawler)",
    cacheTtl: readInt(env, "CACHE_TTL", 3600),
    cacheMaxKeys: readInt(env, "CACHE_MAX_KEYS", 500),
    defaultDepth: readInt(env, "DEFAULT_DEPTH", 2),
    defaultPageBound: readInt(env, "PAGE_BOUND", 50),
    crawlConcurrency: Math.max(1, readInt(env, "CRAWL_CONCURRENCY", 1)),
    allowPrivateNetwork: readBool(env, "ALLOW_PRIVATE_NETWORK", false),
    graphStoreDir:
      env.GRAPH_STORE_DIR ?? join(homedir(), ".docs-graph-mcp", "graphs"),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}
