import type { CrawlTask } from "./types";

/**
 * FIFO work queue with a visited set. Strict head-first popping gives
 * breadth-first order. All methods are synchronous, so concurrent workers on
 * the event loop never interleave inside one.
 */
export class Frontier {
  private queue: CrawlTask[] = [];
  private head = 0;
  private readonly visited = new Set<string>();

  constructor(private readonly maxDepth: number) {}

  /** Returns false when the task was rejected (visited or too deep). */
  push(url: string, depth: number): boolean {
    if (depth > this.maxDepth || this.visited.has(url)) {
      return false;
    }
    this.queue.push({ url, depth });
    return true;
  }

  pop(): CrawlTask | undefined {
    const next = this.queue[this.head];
    if (!next) {
      return undefined;
    }
    this.head += 1;
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return next;
  }

  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }
    this.visited.add(url);
    return true;
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  get pendingCount(): number {
    return this.queue.length - this.head;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  /** Drops every pending task; the visited set is kept. */
  clear(): number {
    const dropped = this.pendingCount;
    this.queue = [];
    this.head = 0;
    return dropped;
  }
}
