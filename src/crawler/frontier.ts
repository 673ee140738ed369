/**
 * @module crawler/frontier
 * @fileoverview Breadth-first frontier with a visited set and traversal bounds.
 *
 * The queue is strictly FIFO. Because every entry is appended at its
 * parent's depth + 1, FIFO order dequeues all depth-d entries before any
 * depth-(d+1) entry, and the depth recorded at first offer is the shortest
 * discovery distance from the root.
 *
 * A URL is claimed in the visited set when it is *offered*, not when it is
 * fetched: a page linked from ten siblings is queued once, at the depth of
 * the first sibling that found it. Offer is synchronous, so the
 * check-and-claim cannot interleave with another offer even when several
 * fetches of one level are in flight.
 *
 * The page bound counts dequeued entries. Once `pageBound` entries have been
 * handed out, `next()` returns `null` and further offers are refused; any
 * entries still queued stay unconsumed.
 */

import { normalizeUrl } from "../utils/url.js";

export interface FrontierEntry {
  readonly url: string;
  readonly depth: number;
}

export interface FrontierOptions {
  rootUrl: string;
  /** Deepest level that may be queued; the root is level 0. */
  requestedDepth: number;
  /** Maximum entries ever dequeued. `0` means nothing is fetched. */
  pageBound: number;
}

export class FrontierScheduler {
  private readonly queue: FrontierEntry[] = [];
  private head = 0;
  private readonly visited = new Set<string>();
  private dequeued = 0;

  readonly requestedDepth: number;
  readonly pageBound: number;

  /**
   * Start a traversal at `rootUrl` (depth 0).
   *
   * @throws {TypeError} When `rootUrl` is not an absolute URL.
   * @throws {RangeError} When a bound is negative or not an integer.
   */
  constructor(options: FrontierOptions) {
    if (!Number.isInteger(options.requestedDepth) || options.requestedDepth < 0) {
      throw new RangeError(`requestedDepth must be a non-negative integer, got ${options.requestedDepth}`);
    }
    if (!Number.isInteger(options.pageBound) || options.pageBound < 0) {
      throw new RangeError(`pageBound must be a non-negative integer, got ${options.pageBound}`);
    }
    this.requestedDepth = options.requestedDepth;
    this.pageBound = options.pageBound;

    const root = normalizeUrl(options.rootUrl);
    if (this.pageBound > 0) {
      this.visited.add(root);
      this.queue.push({ url: root, depth: 0 });
    }
  }

  /** True once `pageBound` entries have been dequeued. */
  get boundReached(): boolean {
    return this.dequeued >= this.pageBound;
  }

  /** Entries queued but not yet dequeued. */
  get pending(): number {
    return this.queue.length - this.head;
  }

  /** URLs claimed so far, dequeued or still queued. */
  get visitedCount(): number {
    return this.visited.size;
  }

  get dequeuedCount(): number {
    return this.dequeued;
  }

  /**
   * Pop the oldest entry, or `null` when the frontier is empty or the page
   * bound has been reached.
   */
  next(): FrontierEntry | null {
    if (this.pending === 0 || this.boundReached) return null;

    const entry = this.queue[this.head];
    this.head += 1;
    this.dequeued += 1;

    // Reclaim the consumed prefix once it dominates the array.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return entry;
  }

  /** Depth of the entry `next()` would return, or `null`. */
  peekDepth(): number | null {
    if (this.pending === 0 || this.boundReached) return null;
    return this.queue[this.head].depth;
  }

  /**
   * Queue `url` at `depth` unless it is already claimed, deeper than the
   * requested depth, or the page bound has been reached.
   *
   * @returns Whether the URL was queued. Unparseable URLs are refused.
   */
  offer(url: string, depth: number): boolean {
    if (depth > this.requestedDepth || this.boundReached) return false;

    let key: string;
    try {
      key = normalizeUrl(url);
    } catch {
      return false;
    }
    if (this.visited.has(key)) return false;

    this.visited.add(key);
    this.queue.push({ url: key, depth });
    return true;
  }

  /** Whether `url` has been claimed in this traversal. */
  hasVisited(url: string): boolean {
    try {
      return this.visited.has(normalizeUrl(url));
    } catch {
      return false;
    }
  }
}
