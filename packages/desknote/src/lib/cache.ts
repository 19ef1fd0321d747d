import type { Notification } from './notification';

/**
 * Notifications currently shown, oldest first, plus an index by platform
 * identifier. Both structures are only ever mutated together, here.
 */
export class NotificationCache {
  readonly limit: number | null;
  // Set keeps insertion order, so its first entry is the oldest.
  private entries = new Set<Notification>();
  private readonly index = new Map<string, Notification>();

  constructor(limit: number | null = null) {
    if (limit !== null && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`Notification limit must be a positive integer, got ${limit}`);
    }

    this.limit = limit;
  }

  get size(): number {
    return this.entries.size;
  }

  get isFull(): boolean {
    return this.limit !== null && this.entries.size >= this.limit;
  }

  record(notification: Notification): void {
    const superseded = this.index.get(notification.identifier);

    if (superseded && superseded !== notification) {
      this.entries.delete(superseded);
    }

    this.entries.add(notification);
    this.indexEntry(notification);
  }

  /**
   * Removes and returns the oldest entry when the cache is at its limit.
   */
  evictOldest(): Notification | undefined {
    if (!this.isFull) {
      return undefined;
    }

    const [oldest] = this.entries;

    if (oldest) {
      this.forget(oldest);
    }

    return oldest;
  }

  /**
   * Puts a previously evicted entry back at the head.
   */
  restore(notification: Notification): void {
    // Sets cannot prepend; rebuilding is fine for the handful of entries a notification center holds.
    this.entries = new Set([notification, ...this.entries]);
    this.indexEntry(notification);
  }

  forget(notification: Notification): void {
    this.entries.delete(notification);

    const id = notification.identifier;

    if (id && this.index.get(id) === notification) {
      this.index.delete(id);
    }
  }

  lookup(identifier: string): Notification | undefined {
    return this.index.get(identifier);
  }

  snapshot(): Notification[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.clear();
    this.index.clear();
  }

  private indexEntry(notification: Notification) {
    if (notification.identifier) {
      this.index.set(notification.identifier, notification);
    }
  }
}
