/**
 * ItemPresenceTracker -- counts consecutive polls in which a discovered item
 * is missing from its table.
 *
 * An item is reported as vanished exactly once, on the poll where its miss
 * count reaches the limit. Showing up again resets the count.
 */

export class ItemPresenceTracker {
  /** Consecutive misses per `${host}\0${check}\0${item}` */
  private misses = new Map<string, number>();

  constructor(private readonly evictAfterMisses: number) {}

  private key(host: string, check: string, item: string): string {
    return `${host}\0${check}\0${item}`;
  }

  /**
   * Record one poll of a check on a host.
   * Returns the items that have now been missing for `evictAfterMisses` polls.
   */
  observe(host: string, check: string, known: Iterable<string>, present: ReadonlySet<string>): string[] {
    const vanished: string[] = [];

    for (const item of known) {
      const key = this.key(host, check, item);

      if (present.has(item)) {
        this.misses.delete(key);
        continue;
      }

      const count = (this.misses.get(key) ?? 0) + 1;
      if (count >= this.evictAfterMisses) {
        this.misses.delete(key);
        vanished.push(item);
      } else {
        this.misses.set(key, count);
      }
    }

    return vanished;
  }

  /** Current miss count of an item (0 when present or unknown) */
  getMisses(host: string, check: string, item: string): number {
    return this.misses.get(this.key(host, check, item)) ?? 0;
  }

  forget(host: string, check?: string): void {
    const prefix = check === undefined ? `${host}\0` : `${host}\0${check}\0`;
    for (const key of [...this.misses.keys()]) {
      if (key.startsWith(prefix)) this.misses.delete(key);
    }
  }
}
