/**
 * @module context
 * @fileoverview Wires the long-lived collaborators shared by all tools.
 *
 * ```
 * HttpFetchClient ─► CachingFetchClient(PageCache) ─► ExtractorDispatcher
 * GraphStore (file or memory)
 * ```
 *
 * Tests build a {@link ServerContext} by hand around a fake fetch client and
 * a `MemoryGraphStore`.
 */

import type { AppConfig } from "./config.js";
import { ExtractorDispatcher } from "./crawler/dispatcher.js";
import { HttpFetchClient, httpFetchClientOptions } from "./extractor/http-fetch-client.js";
import type { Logger } from "./logger.js";
import { createGraphStore } from "./store/graph-store.js";
import type { GraphStore } from "./store/graph-store.js";
import { CachingFetchClient, PageCache } from "./store/page-cache.js";

export interface ServerContext {
  config: AppConfig;
  dispatcher: ExtractorDispatcher;
  store: GraphStore;
  logger: Logger;
  /** Release timers and wait for in-flight requests. */
  close(): Promise<void>;
}

export function createServerContext(config: AppConfig, logger: Logger): ServerContext {
  const httpClient = new HttpFetchClient(httpFetchClientOptions(config));
  const pageCache = new PageCache({
    ttlSeconds: config.cacheTtl,
    maxKeys: config.cacheMaxKeys,
    logger,
  });
  const dispatcher = new ExtractorDispatcher(new CachingFetchClient(httpClient, pageCache), {
    logger,
  });

  return {
    config,
    dispatcher,
    store: createGraphStore(config.graphStoreDir),
    logger,
    async close() {
      pageCache.close();
      await httpClient.close();
    },
  };
}
