/**
 * @module services/queue
 * @fileoverview Two-level request scheduling for outbound fetches.
 *
 * ```
 *   task ──► domain queue (1 at a time, 1 per interval) ──► global queue (N) ──► fetch
 * ```
 *
 * The per-domain queue keeps a traversal polite towards the one host it is
 * reading; the global queue caps the total number of sockets when several
 * traversals or single-page fetches run side by side.
 *
 * Each {@link HttpFetchClient} owns one manager, created from its config.
 */

import PQueue from "p-queue";

export interface QueueManagerOptions {
  /** Maximum tasks running at once across all domains. */
  maxConcurrent: number;
  /** Minimum milliseconds between two task starts on one domain. */
  perDomainInterval: number;
}

export class QueueManager {
  private readonly globalQueue: PQueue;
  private readonly domainQueues = new Map<string, PQueue>();
  private readonly perDomainInterval: number;

  constructor(options: QueueManagerOptions) {
    this.globalQueue = new PQueue({ concurrency: options.maxConcurrent });
    this.perDomainInterval = options.perDomainInterval;
  }

  private getDomainQueue(domain: string): PQueue {
    let queue = this.domainQueues.get(domain);
    if (!queue) {
      queue = new PQueue({
        concurrency: 1,
        interval: this.perDomainInterval,
        intervalCap: 1,
      });
      this.domainQueues.set(domain, queue);
    }
    return queue;
  }

  /**
   * Run `fn` once both the domain's rate limit and the global concurrency
   * limit allow it.
   *
   * When `signal` aborts while the task is still waiting, the returned
   * promise rejects with the signal's reason and `fn` never runs.
   */
  enqueue<T>(domain: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.getDomainQueue(domain).add<T>(
      () => this.globalQueue.add<T>(fn, { throwOnTimeout: true, signal }),
      { throwOnTimeout: true, signal },
    );
  }

  /** Resolve once every queue is empty and idle. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.domainQueues.values(), (queue) => queue.onIdle()));
    await this.globalQueue.onIdle();
  }
}
