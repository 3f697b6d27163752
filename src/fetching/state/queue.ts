export interface CrawlQueueItem {
  url: string;
  depth: number;
}

const COMPACT_THRESHOLD = 32;

/** FIFO of URLs still to visit; every URL is accepted at most once. */
export class CrawlQueue {
  private queue: CrawlQueueItem[] = [];
  private head = 0;
  private readonly seen = new Set<string>();

  constructor(initialUrls: readonly string[] = []) {
    for (const url of initialUrls) {
      this.enqueueIfNew(url, 0);
    }
  }

  enqueueIfNew(url: string, depth: number): boolean {
    if (this.seen.has(url)) {
      return false;
    }

    this.markVisited(url);
    this.queue.push({ url, depth });
    return true;
  }

  dequeue(): CrawlQueueItem | undefined {
    const next = this.queue[this.head];
    if (!next) {
      return undefined;
    }

    this.head += 1;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  /** Removes and returns every queued item sitting at `depth` at the front of the queue. */
  dequeueLevel(depth: number): CrawlQueueItem[] {
    const level: CrawlQueueItem[] = [];
    while (this.peek()?.depth === depth) {
      const item = this.dequeue();
      if (item) {
        level.push(item);
      }
    }
    return level;
  }

  peek(): CrawlQueueItem | undefined {
    return this.queue[this.head];
  }

  markVisited(url: string): void {
    this.seen.add(url);
  }

  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  get uniqueCount(): number {
    return this.seen.size;
  }
}
