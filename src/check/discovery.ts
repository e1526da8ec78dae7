/**
 * Item Registry -- derives monitorable items from a normalized table.
 *
 * Item ids come from table content only, never from row position or random
 * values, so the same entity keeps its id (and its history) across polls.
 */

import type { Item, NormalizedTable } from './types.js';

export type Row = ReadonlyArray<string>;

export interface DiscoveryRule {
  /** Stable identifier of the entity a row describes */
  itemId(row: Row): string;
  /** Skip rows that describe nothing monitorable */
  filter?(row: Row): boolean;
  /** Parameters captured at discovery time and handed to every later check */
  params?(row: Row): Record<string, unknown>;
}

/** Rule reading the item id from one column. */
export function columnRule(column: number, extra: Omit<DiscoveryRule, 'itemId'> = {}): DiscoveryRule {
  return {
    itemId: (row) => (row[column] ?? '').trim(),
    ...extra,
  };
}

export function discover(table: NormalizedTable, rule: DiscoveryRule): Item[] {
  const items: Item[] = [];
  const seen = new Set<string>();

  for (const row of table) {
    if (rule.filter && !rule.filter(row)) continue;

    const itemId = rule.itemId(row);
    if (!itemId) continue;

    if (seen.has(itemId)) {
      console.warn(`[Discovery] Duplicate item '${itemId}', keeping the first row`);
      continue;
    }
    seen.add(itemId);

    items.push({ itemId, discoveryParams: rule.params ? rule.params(row) : {} });
  }

  return items;
}

/** Row of the table describing `itemId`, if the item is still present. */
export function findRow(table: NormalizedTable, rule: DiscoveryRule, itemId: string): Row | undefined {
  return table.find((row) => (!rule.filter || rule.filter(row)) && rule.itemId(row) === itemId);
}
