// ---------------------------------------------------------------------------
// Check plugin and monitor domain types
// ---------------------------------------------------------------------------

import type { DiscoveryRule, Row } from '../check/discovery.js';
import type { Evaluator } from '../check/evaluator.js';
import type { CheckDefaults, CheckParams } from '../check/policy.js';
import type { EvaluationResult, NormalizedTable } from '../check/types.js';

/**
 * Everything a check function gets for one item in one poll.
 * `params` are the operator parameters already laid over the plugin defaults.
 */
export interface CheckContext {
  host: string;
  item: string;
  row: Row;
  table: NormalizedTable;
  params: CheckParams;
  discoveryParams: Record<string, unknown>;
  /** Poll time, seconds since epoch */
  now: number;
  evaluator: Evaluator;
  /** Device value meaning "no level configured on the device" */
  deviceLevelSentinel: number;
  /** Counter id for a metric of this item */
  counterId(metric: string): string;
}

/**
 * A check plugin: glue between one normalized section and the core.
 * Discovery decides the items, check() evaluates one of them.
 */
export interface CheckPlugin {
  name: string;
  /** Name of the normalized table the plugin reads */
  section: string;
  discovery: DiscoveryRule;
  defaults: CheckDefaults;
  check(ctx: CheckContext): EvaluationResult;
}

export interface ServiceResult {
  host: string;
  check: string;
  item: string;
  result: EvaluationResult;
  /** Poll time, seconds since epoch */
  timestamp: number;
}

/** Tables of one host, keyed by section name. */
export type HostTables = Record<string, NormalizedTable>;
