import type { FailureEvent, FrontierEntry } from '../../types.js';

export class FailureTracker {
  private readonly log: FailureEvent[] = [];

  record(entry: FrontierEntry, error: Error): FailureEvent {
    const event = createFailureEvent(entry, error);
    this.log.push(event);
    return event;
  }

  get size(): number {
    return this.log.length;
  }

  list(): FailureEvent[] {
    return [...this.log];
  }
}

export function createFailureEvent(entry: FrontierEntry, error: Error): FailureEvent {
  return {
    url: entry.url,
    depth: entry.depth,
    reason: error.message || 'Request failed',
    errorName: error.name,
  };
}
