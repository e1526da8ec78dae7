/**
 * Operator rules file: { "<check>": { "<item>" | "*": { ...parameters } } }.
 *
 * "*" applies to every item of a check; an item entry is laid over it. The
 * parameters themselves are validated later, per check, by resolveParams(),
 * so a bad entry only turns the affected services UNKNOWN.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

const rulesSchema = z.record(z.string(), z.record(z.string(), z.record(z.string(), z.unknown())));

export type CheckRules = z.infer<typeof rulesSchema>;

export const WILDCARD_ITEM = '*';

export function parseCheckRules(raw: unknown): CheckRules {
  return rulesSchema.parse(raw);
}

/**
 * Load the rules file. A missing file means "factory defaults everywhere";
 * an unreadable or malformed one is logged and ignored.
 */
export function loadCheckRules(path: string): CheckRules {
  if (!existsSync(path)) {
    console.log(`[Rules] No rules file at ${path}, using factory defaults`);
    return {};
  }

  try {
    const rules = parseCheckRules(JSON.parse(readFileSync(path, 'utf-8')));
    console.log(`[Rules] Loaded rules for ${Object.keys(rules).length} check(s) from ${path}`);
    return rules;
  } catch (err) {
    console.error(`[Rules] Ignoring invalid rules file ${path}:`, err instanceof Error ? err.message : err);
    return {};
  }
}

/** Raw parameters for one item: wildcard entry first, item entry on top. */
export function rulesFor(rules: CheckRules, check: string, item: string | null): Record<string, unknown> {
  const forCheck = rules[check];
  if (!forCheck) return {};
  return {
    ...forCheck[WILDCARD_ITEM],
    ...(item !== null ? forCheck[item] : undefined),
  };
}
