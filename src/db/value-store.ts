/**
 * Value Store -- durable per-counter state (last value, last timestamp).
 *
 * Counter ids are built from (host, check, item, metric) so two unrelated
 * counters can never share a record. Records are only ever overwritten or
 * removed through an explicit eviction; there is no expiry.
 *
 * Read failures and corrupt rows are logged and reported as "absent" so the
 * Rate Calculator falls back to first-sample behaviour.
 */

import { count, eq, sql } from 'drizzle-orm';
import type { CheckDatabase } from './index.js';
import { counterStates } from './schema.js';

export interface RateState {
  counterId: string;
  lastValue: number;
  lastTimestamp: number;
}

export interface ValueStore {
  get(counterId: string): RateState | undefined;
  put(counterId: string, state: RateState): void;
  /** Delete every record whose id starts with `prefix`. Returns the number removed. */
  evict(prefix: string): number;
  size(): number;
}

export interface CounterKey {
  host: string;
  check: string;
  item?: string | null;
  metric: string;
}

function escapeComponent(part: string): string {
  return part.replace(/%/g, '%25').replace(/\//g, '%2F');
}

/** Stable counter id: host/check/item/metric, components percent-escaped. */
export function counterId(key: CounterKey): string {
  return [key.host, key.check, key.item ?? '', key.metric].map(escapeComponent).join('/');
}

/** Id prefix covering a host, a check on a host, or one item of a check. */
export function counterPrefix(host: string, check?: string, item?: string | null): string {
  const parts = [host];
  if (check !== undefined) {
    parts.push(check);
    if (item !== undefined) parts.push(item ?? '');
  }
  return parts.map(escapeComponent).join('/') + '/';
}

function isUsable(state: RateState): boolean {
  return Number.isFinite(state.lastValue) && Number.isFinite(state.lastTimestamp);
}

// ---------------------------------------------------------------------------
// SQLite-backed store
// ---------------------------------------------------------------------------

export class SqliteValueStore implements ValueStore {
  constructor(private readonly db: CheckDatabase) {}

  get(id: string): RateState | undefined {
    let row: typeof counterStates.$inferSelect | undefined;
    try {
      row = this.db.select().from(counterStates).where(eq(counterStates.counterId, id)).get();
    } catch (err) {
      console.warn(`[ValueStore] Read failed for ${id}:`, err instanceof Error ? err.message : err);
      return undefined;
    }
    if (!row) return undefined;

    const state: RateState = {
      counterId: row.counterId,
      lastValue: row.lastValue,
      lastTimestamp: row.lastTimestamp,
    };
    if (!isUsable(state)) {
      console.warn(`[ValueStore] Ignoring corrupt record for ${id}`);
      return undefined;
    }
    return state;
  }

  put(id: string, state: RateState): void {
    // Single-row upsert: atomic, so a reader sees the old or the new record
    this.db.insert(counterStates)
      .values({
        counterId: id,
        lastValue: state.lastValue,
        lastTimestamp: state.lastTimestamp,
      })
      .onConflictDoUpdate({
        target: counterStates.counterId,
        set: {
          lastValue: state.lastValue,
          lastTimestamp: state.lastTimestamp,
          updatedAt: sql`(datetime('now'))`,
        },
      })
      .run();
  }

  evict(prefix: string): number {
    const result = this.db.delete(counterStates)
      // SQLite measures the prefix: its length() counts characters, not UTF-16 units
      .where(sql`substr(${counterStates.counterId}, 1, length(${prefix})) = ${prefix}`)
      .run();
    return result.changes;
  }

  size(): number {
    const row = this.db.select({ n: count() }).from(counterStates).get();
    return row?.n ?? 0;
  }
}

// ---------------------------------------------------------------------------
// In-memory store (tests, or running without persistence)
// ---------------------------------------------------------------------------

export class MemoryValueStore implements ValueStore {
  private states = new Map<string, RateState>();

  get(id: string): RateState | undefined {
    const state = this.states.get(id);
    if (!state || !isUsable(state)) return undefined;
    return { ...state };
  }

  put(id: string, state: RateState): void {
    this.states.set(id, { ...state, counterId: id });
  }

  evict(prefix: string): number {
    let removed = 0;
    for (const id of [...this.states.keys()]) {
      if (id.startsWith(prefix)) {
        this.states.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.states.size;
  }
}
