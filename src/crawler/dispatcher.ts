/**
 * @module crawler/dispatcher
 * @fileoverview Maps an extraction mode onto one fetch-client call.
 *
 * The dispatcher is the traversal's only way to reach the network. Its one
 * promise: `fetch()` always resolves to a {@link PageResult}. Thrown errors,
 * rejected promises, timeouts and results of the wrong shape all come back
 * as `succeeded: false`, so a single broken page cannot abort a traversal.
 *
 * It holds no cache; see `store/page-cache.ts` for that.
 */

import type {
  ExtractionMode,
  FailureStage,
  FetchClient,
  PageFailure,
  PageResult,
} from "./types.js";
import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import {
  ExtractionError,
  TimeoutError,
  errorCode,
  errorMessage,
} from "../utils/errors.js";

function stageOf(error: unknown): FailureStage {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof ExtractionError) return "extract";
  return "fetch";
}

/** Build a failed result from any caught value. */
export function failedPage(url: string, error: unknown): PageFailure {
  return {
    succeeded: false,
    url,
    error: errorMessage(error),
    code: errorCode(error),
    stage: stageOf(error),
  };
}

export interface DispatcherOptions {
  logger?: Logger;
}

export class ExtractorDispatcher {
  private readonly client: FetchClient;
  private readonly log: Logger;

  constructor(client: FetchClient, options: DispatcherOptions = {}) {
    this.client = client;
    this.log = (options.logger ?? rootLogger).child({ component: "dispatcher" });
  }

  /**
   * Fetch `url` in `mode`. Never rejects.
   *
   * - `structured`: body carries title, concepts, api surface, code samples.
   * - `document`: body is the rendered page text.
   * - `links`: only `outboundLinks` (and the link list body) are meaningful.
   */
  async fetch(url: string, mode: ExtractionMode, signal?: AbortSignal): Promise<PageResult> {
    let result: PageResult;
    try {
      result = await this.client.fetch({ url, mode }, { signal });
    } catch (error) {
      this.log.debug({ url, mode, err: error }, "fetch client threw");
      return failedPage(url, error);
    }

    if (result.succeeded && result.body.kind !== mode) {
      return failedPage(
        url,
        new ExtractionError(
          `Fetch client returned a ${result.body.kind} body for a ${mode} request`,
        ),
      );
    }
    return result;
  }
}
