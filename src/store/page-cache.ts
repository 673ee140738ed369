/**
 * @module store/page-cache
 * @fileoverview Bounded, age-limited cache of successful page results.
 *
 * The cache sits in front of a {@link FetchClient} as a decorator, so the
 * traversal and the dispatcher stay cache-free. Entries expire `ttlSeconds`
 * after they were written; once `maxKeys` live entries exist, new results
 * are simply not cached until older ones expire.
 *
 * Keys are SHA-256 hashes of `mode + url`: the same page fetched as a
 * document and as structured fields is two entries.
 */

import crypto from "node:crypto";
import NodeCache from "node-cache";
import type { FetchClient, FetchOptions, PageRequest, PageResult, PageSuccess } from "../crawler/types.js";
import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export interface PageCacheOptions {
  /** Freshness window in seconds. `0` keeps entries until evicted by `clear()`. */
  ttlSeconds: number;
  /** Maximum live entries. `0` means unbounded. */
  maxKeys: number;
  logger?: Logger;
}

export interface PageCacheStats {
  hits: number;
  misses: number;
  /** Percentage of lookups served from the cache. */
  hitRate: number;
  entries: number;
}

export class PageCache {
  private readonly cache: NodeCache;
  private readonly maxKeys: number;
  private readonly log: Logger;
  private hitCount = 0;
  private missCount = 0;

  constructor(options: PageCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.log = (options.logger ?? rootLogger).child({ component: "page-cache" });
    this.cache = new NodeCache({
      stdTTL: options.ttlSeconds,
      checkperiod: options.ttlSeconds > 0 ? Math.max(60, Math.floor(options.ttlSeconds * 0.2)) : 0,
      // Bound enforced in set(); node-cache would throw instead.
      maxKeys: -1,
      // Results are frozen by the caching client before storage.
      useClones: false,
    });
  }

  private keyFor(request: PageRequest): string {
    return crypto.createHash("sha256").update(`${request.mode}\n${request.url}`).digest("hex");
  }

  get(request: PageRequest): PageSuccess | undefined {
    const hit = this.cache.get<PageSuccess>(this.keyFor(request));
    if (hit === undefined) {
      this.missCount++;
    } else {
      this.hitCount++;
    }
    return hit;
  }

  /**
   * Store `result` unless the cache is full.
   *
   * @returns Whether the entry was stored.
   */
  set(request: PageRequest, result: PageSuccess): boolean {
    const key = this.keyFor(request);
    if (this.maxKeys > 0 && !this.cache.has(key) && this.cache.keys().length >= this.maxKeys) {
      this.log.debug({ url: request.url, maxKeys: this.maxKeys }, "page cache full, entry skipped");
      return false;
    }
    return this.cache.set<PageSuccess>(key, result);
  }

  stats(): PageCacheStats {
    const total = this.hitCount + this.missCount;
    return {
      hits: this.hitCount,
      misses: this.missCount,
      hitRate: total > 0 ? (this.hitCount / total) * 100 : 0,
      entries: this.cache.keys().length,
    };
  }

  clear(): void {
    this.cache.flushAll();
    this.hitCount = 0;
    this.missCount = 0;
  }

  /** Stop the expiry timer. */
  close(): void {
    this.cache.close();
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Caching Decorator
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * {@link FetchClient} that answers from a {@link PageCache} when it can and
 * stores the successful results of its inner client.
 *
 * Cached results are returned with `metadata.fromCache = true`. Failures are
 * never cached.
 */
export class CachingFetchClient implements FetchClient {
  constructor(
    private readonly inner: FetchClient,
    private readonly cache: PageCache,
  ) {}

  async fetch(request: PageRequest, options?: FetchOptions): Promise<PageResult> {
    const cached = this.cache.get(request);
    if (cached !== undefined) {
      return { ...cached, metadata: { ...cached.metadata, fromCache: true } };
    }

    const result = await this.inner.fetch(request, options);
    if (result.succeeded) {
      this.cache.set(request, Object.freeze({ ...result }));
    }
    return result;
  }
}
