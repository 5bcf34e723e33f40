import { Clock, systemClock } from './clock';

export interface BoundedWindowCacheOptions {
  windowMs: number;
  maxEvents: number;
  /** Keys beyond this bound evict the least recently touched one. */
  maxKeys: number;
  clock?: Clock;
}

/**
 * Process-local sliding-window counter. State is lost on restart and is not
 * shared between instances; the persistent RateLimitService remains the
 * source of truth.
 */
export class BoundedWindowCache {
  private readonly entries = new Map<string, number[]>();
  private readonly clock: Clock;

  constructor(private readonly options: BoundedWindowCacheOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.entries.size;
  }

  count(key: string): number {
    return this.live(key, this.clock().getTime()).length;
  }

  isBlocked(key: string): boolean {
    return this.count(key) >= this.options.maxEvents;
  }

  /** Records one event and returns the number of events now in the window. */
  record(key: string): number {
    const now = this.clock().getTime();
    const events = this.live(key, now);
    events.push(now);
    this.touch(key, events);
    return events.length;
  }

  /** Records an event unless the window is already full. */
  tryConsume(key: string): boolean {
    if (this.isBlocked(key)) {
      return false;
    }
    this.record(key);
    return true;
  }

  reset(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private live(key: string, now: number): number[] {
    const events = this.entries.get(key);
    if (!events) {
      return [];
    }
    const cutoff = now - this.options.windowMs;
    return events.filter((timestamp) => timestamp > cutoff);
  }

  private touch(key: string, events: number[]): void {
    this.entries.delete(key);
    this.entries.set(key, events);

    while (this.entries.size > this.options.maxKeys) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
