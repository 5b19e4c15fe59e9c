import { FrontierEntry } from '../../types.js';
import { normalizeUrl } from '../url/normalizeUrl.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO crawl queue plus the visited set. Dedup happens at push time: once a URL has been
 * pushed it is never queued again, so every URL is popped (and fetched) at most once.
 */
export class Frontier {
  private queue: FrontierEntry[] = [];
  private head = 0;
  private nextSequence = 0;
  private readonly visited = new Set<string>();

  /** Returns false when the URL is unusable or was already pushed. */
  push(url: string, depth = 0): boolean {
    const normalized = normalizeUrl(url);
    if (!normalized || this.visited.has(normalized)) {
      return false;
    }

    this.visited.add(normalized);
    this.queue.push({ url: normalized, sequence: this.nextSequence, depth });
    this.nextSequence += 1;
    return true;
  }

  pop(): FrontierEntry | undefined {
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

  isEmpty(): boolean {
    return this.pending === 0;
  }

  has(url: string): boolean {
    const normalized = normalizeUrl(url);
    return normalized !== null && this.visited.has(normalized);
  }

  visitedUrls(): string[] {
    return [...this.visited];
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  get uniqueCount(): number {
    return this.visited.size;
  }
}
