/**
 * CheckRunner -- runs the registered check plugins against the tables of a
 * host in one poll cycle.
 *
 * - Items are discovered the first time a plugin's section shows up for a
 *   host; new items seen later are added, known ones keep the discovery
 *   parameters they were found with.
 * - Every item yields a result. Plugin exceptions, bad operator parameters and
 *   missing rows all become UNKNOWN results.
 * - Items missing for `evictAfterMisses` consecutive polls are dropped from
 *   the inventory and their counters are evicted from the Value Store.
 */

import { Averager } from '../check/average.js';
import { discover, findRow } from '../check/discovery.js';
import { errorMessage } from '../check/errors.js';
import { Evaluator, unknownResult } from '../check/evaluator.js';
import { resolveParams } from '../check/policy.js';
import { RateCalculator } from '../check/rate.js';
import { rulesFor, type CheckRules } from '../check/rules.js';
import type { EvaluationResult, Item, NormalizedTable } from '../check/types.js';
import { counterId, counterPrefix, type ValueStore } from '../db/value-store.js';
import { ItemPresenceTracker } from './presence-tracker.js';
import type { CheckPlugin, HostTables, ServiceResult } from './types.js';

export interface CheckRunnerOptions {
  plugins: CheckPlugin[];
  store: ValueStore;
  rules?: CheckRules;
  deviceLevelSentinel?: number;
  evictAfterMisses?: number;
}

export class CheckRunner {
  private readonly plugins: CheckPlugin[];
  private readonly store: ValueStore;
  private readonly rates: RateCalculator;
  private readonly evaluator: Evaluator;
  private readonly presence: ItemPresenceTracker;
  private readonly deviceLevelSentinel: number;
  private rules: CheckRules;

  /** host -> check -> discovered items */
  private inventory = new Map<string, Map<string, Item[]>>();

  constructor(options: CheckRunnerOptions) {
    this.plugins = options.plugins;
    this.store = options.store;
    this.rules = options.rules ?? {};
    this.deviceLevelSentinel = options.deviceLevelSentinel ?? 0;
    this.presence = new ItemPresenceTracker(options.evictAfterMisses ?? 3);
    this.rates = new RateCalculator(options.store);
    this.evaluator = new Evaluator(this.rates, new Averager(options.store));
  }

  setRules(rules: CheckRules): void {
    this.rules = rules;
  }

  getPlugin(name: string): CheckPlugin | undefined {
    return this.plugins.find((p) => p.name === name);
  }

  /** Discovered items of a host, keyed by check name */
  getInventory(host: string): Record<string, Item[]> {
    return Object.fromEntries(this.inventory.get(host) ?? []);
  }

  /**
   * Discover items of one plugin. Items already known keep their discovery
   * parameters; the returned list is the merged inventory.
   */
  runDiscovery(host: string, plugin: CheckPlugin, table: NormalizedTable): Item[] {
    return this.mergeInventory(host, plugin, this.discoverSafely(host, plugin, table) ?? []);
  }

  private discoverSafely(host: string, plugin: CheckPlugin, table: NormalizedTable): Item[] | null {
    try {
      return discover(table, plugin.discovery);
    } catch (err) {
      console.error(`[Runner] Discovery of ${plugin.name} on ${host} failed:`, errorMessage(err));
      return null;
    }
  }

  private mergeInventory(host: string, plugin: CheckPlugin, found: Item[]): Item[] {
    let byCheck = this.inventory.get(host);
    if (!byCheck) {
      byCheck = new Map();
      this.inventory.set(host, byCheck);
    }

    const known = byCheck.get(plugin.name) ?? [];
    const knownIds = new Set(known.map((i) => i.itemId));
    const added = found.filter((i) => !knownIds.has(i.itemId));
    if (added.length > 0) {
      console.log(`[Runner] ${host}: discovered ${added.length} new ${plugin.name} item(s): ${added.map((i) => i.itemId).join(', ')}`);
    }

    const merged = [...known, ...added];
    byCheck.set(plugin.name, merged);
    return merged;
  }

  /** Evaluate one item. Never throws. */
  runCheck(host: string, plugin: CheckPlugin, item: Item, table: NormalizedTable, now: number): EvaluationResult {
    try {
      const row = findRow(table, plugin.discovery, item.itemId);
      if (!row) return unknownResult('Item not found in monitoring data');

      const params = resolveParams(rulesFor(this.rules, plugin.name, item.itemId), plugin.defaults);

      return plugin.check({
        host,
        item: item.itemId,
        row,
        table,
        params,
        discoveryParams: item.discoveryParams,
        now,
        evaluator: this.evaluator,
        deviceLevelSentinel: this.deviceLevelSentinel,
        counterId: (metric) => counterId({ host, check: plugin.name, item: item.itemId, metric }),
      });
    } catch (err) {
      return unknownResult(`Check failed: ${errorMessage(err)}`);
    }
  }

  /**
   * One poll cycle of a host: discover, check every item of every plugin
   * whose section is present, then handle vanished items.
   */
  pollHost(host: string, tables: HostTables, now: number): ServiceResult[] {
    const results: ServiceResult[] = [];

    this.rates.beginCycle();
    try {
      for (const plugin of this.plugins) {
        const table = tables[plugin.section];
        if (!table) continue;

        const found = this.discoverSafely(host, plugin, table);
        const items = this.mergeInventory(host, plugin, found ?? []);
        for (const item of items) {
          results.push({
            host,
            check: plugin.name,
            item: item.itemId,
            result: this.runCheck(host, plugin, item, table, now),
            timestamp: now,
          });
        }

        // A table that cannot be read says nothing about which items are gone
        if (!found) continue;

        const present = new Set(found.map((i) => i.itemId));
        const vanished = this.presence.observe(host, plugin.name, items.map((i) => i.itemId), present);
        for (const item of vanished) {
          this.evictItem(host, plugin.name, item);
        }
      }
    } finally {
      this.rates.endCycle();
    }

    return results;
  }

  /**
   * Forget an item (or every item of a check, or a whole host) and drop its
   * counter state. Returns the number of counter records removed.
   */
  evictItem(host: string, check?: string, item?: string): number {
    const byCheck = this.inventory.get(host);
    if (check === undefined) {
      this.inventory.delete(host);
      this.presence.forget(host);
    } else if (item === undefined) {
      byCheck?.delete(check);
      this.presence.forget(host, check);
    } else if (byCheck) {
      const remaining = (byCheck.get(check) ?? []).filter((i) => i.itemId !== item);
      byCheck.set(check, remaining);
    }

    let removed = 0;
    try {
      removed = this.store.evict(counterPrefix(host, check, item));
    } catch (err) {
      console.warn(`[Runner] Could not evict counters of ${host}/${check ?? '*'}/${item ?? '*'}:`, errorMessage(err));
    }
    console.log(`[Runner] Evicted ${host}/${check ?? '*'}/${item ?? '*'} (${removed} counter record(s))`);
    return removed;
  }
}
