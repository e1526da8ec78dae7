/**
 * Tests for the Value Store: SQLite-backed (in-memory database) and
 * Map-backed implementations, plus counter id construction.
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { openDatabase, type DatabaseHandle } from '../db/index.js';
import { createTables, runMigrations } from '../db/migrate.js';
import {
  MemoryValueStore,
  SqliteValueStore,
  counterId,
  counterPrefix,
  type ValueStore,
} from '../db/value-store.js';

describe('counterId', () => {
  it('joins host, check, item and metric', () => {
    expect(counterId({ host: 'fw1', check: 'firewall_if', item: 'eth0', metric: 'ip4_in_blocked' }))
      .toBe('fw1/firewall_if/eth0/ip4_in_blocked');
  });

  it('escapes separators inside components', () => {
    expect(counterId({ host: 'h/1', check: 'df', item: '50%/x', metric: 'm' }))
      .toBe('h%2F1/df/50%25%2Fx/m');
  });

  it('leaves the item empty for checks without items', () => {
    expect(counterId({ host: 'h', check: 'uptime', item: null, metric: 'm' })).toBe('h/uptime//m');
  });
});

describe('counterPrefix', () => {
  it('covers a host, a check or an item', () => {
    expect(counterPrefix('h')).toBe('h/');
    expect(counterPrefix('h', 'df')).toBe('h/df/');
    expect(counterPrefix('h', 'df', '/var')).toBe('h/df/%2Fvar/');
  });

  it('does not let one item prefix another', () => {
    const prefix = counterPrefix('h', 'if', 'eth1');
    expect(counterId({ host: 'h', check: 'if', item: 'eth10', metric: 'm' }).startsWith(prefix)).toBe(false);
  });
});

function storeContract(name: string, create: () => ValueStore) {
  describe(name, () => {
    let store: ValueStore;

    beforeEach(() => {
      store = create();
    });

    it('returns undefined for an unknown counter', () => {
      expect(store.get('nope')).toBeUndefined();
    });

    it('round-trips a record', () => {
      store.put('h/c/i/m', { counterId: 'h/c/i/m', lastValue: 1000, lastTimestamp: 100.5 });
      expect(store.get('h/c/i/m')).toEqual({ counterId: 'h/c/i/m', lastValue: 1000, lastTimestamp: 100.5 });
    });

    it('overwrites the previous record', () => {
      store.put('x', { counterId: 'x', lastValue: 1, lastTimestamp: 1 });
      store.put('x', { counterId: 'x', lastValue: 2, lastTimestamp: 2 });
      expect(store.get('x')).toEqual({ counterId: 'x', lastValue: 2, lastTimestamp: 2 });
      expect(store.size()).toBe(1);
    });

    it('evicts by prefix', () => {
      store.put('h1/if/eth0/m', { counterId: 'h1/if/eth0/m', lastValue: 1, lastTimestamp: 1 });
      store.put('h1/if/eth1/m', { counterId: 'h1/if/eth1/m', lastValue: 1, lastTimestamp: 1 });
      store.put('h2/if/eth0/m', { counterId: 'h2/if/eth0/m', lastValue: 1, lastTimestamp: 1 });

      expect(store.evict('h1/if/eth0/')).toBe(1);
      expect(store.evict('h1/')).toBe(1);
      expect(store.size()).toBe(1);
      expect(store.get('h2/if/eth0/m')?.lastValue).toBe(1);
    });

    it('evicts items whose names lie outside the basic multilingual plane', () => {
      const id = counterId({ host: 'h', check: 'c', item: 'sensor🔥', metric: 'm' });
      store.put(id, { counterId: id, lastValue: 1, lastTimestamp: 1 });
      store.put('h/c/sensor/m', { counterId: 'h/c/sensor/m', lastValue: 1, lastTimestamp: 1 });

      expect(store.evict(counterPrefix('h', 'c', 'sensor🔥'))).toBe(1);
      expect(store.get(id)).toBeUndefined();
      expect(store.get('h/c/sensor/m')).toBeDefined();
    });

    it('treats LIKE wildcards in a prefix literally', () => {
      store.put('h_1/m', { counterId: 'h_1/m', lastValue: 1, lastTimestamp: 1 });
      store.put('hx1/m', { counterId: 'hx1/m', lastValue: 1, lastTimestamp: 1 });
      expect(store.evict('h_1/')).toBe(1);
      expect(store.get('hx1/m')).toBeDefined();
    });
  });
}

const handles: DatabaseHandle[] = [];

afterAll(() => {
  for (const h of handles) h.sqlite.close();
});

storeContract('MemoryValueStore', () => new MemoryValueStore());

storeContract('SqliteValueStore', () => {
  const handle = openDatabase(':memory:');
  createTables(handle);
  handles.push(handle);
  return new SqliteValueStore(handle.db);
});

describe('SqliteValueStore failures', () => {
  let db: DatabaseHandle;
  let store: SqliteValueStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    createTables(db);
    store = new SqliteValueStore(db.db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (db.sqlite.open) db.sqlite.close();
  });

  it('reports a corrupt record as absent', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    db.sqlite
      .prepare('INSERT INTO counter_states (counter_id, last_value, last_timestamp) VALUES (?, ?, ?)')
      .run('bad', 'not a number', 100);

    expect(store.get('bad')).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('[ValueStore] Ignoring corrupt record for bad');
  });

  it('reports an unreadable store as absent', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    db.sqlite.close();

    expect(store.get('x')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('migrates a fresh database', async () => {
    const fresh = openDatabase(':memory:');
    await runMigrations(fresh);
    new SqliteValueStore(fresh.db).put('x', { counterId: 'x', lastValue: 1, lastTimestamp: 2 });
    expect(new SqliteValueStore(fresh.db).size()).toBe(1);
    fresh.sqlite.close();
  });

  it('creates the table idempotently', () => {
    store.put('x', { counterId: 'x', lastValue: 3, lastTimestamp: 4 });
    createTables(db);
    expect(store.get('x')?.lastValue).toBe(3);
  });
});
