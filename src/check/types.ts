// ---------------------------------------------------------------------------
// Check evaluation domain types
// ---------------------------------------------------------------------------

/**
 * Service states. The numeric value orders severity for aggregation:
 * the worst state of several sub-results is the numerically highest one.
 */
export enum State {
  OK = 0,
  WARN = 1,
  CRIT = 2,
  UNKNOWN = 3,
}

export const STATE_NAMES: Record<State, string> = {
  [State.OK]: 'OK',
  [State.WARN]: 'WARN',
  [State.CRIT]: 'CRIT',
  [State.UNKNOWN]: 'UNKNOWN',
};

/** A warn/crit pair. For lower levels the values are read as "at or below". */
export type Levels = readonly [warn: number, crit: number];

export type Direction = 'upper' | 'lower';

export interface FixedPolicy {
  kind: 'fixed';
  warn: number;
  crit: number;
  direction: Direction;
}

export interface FixedLowerPolicy {
  kind: 'fixed_lower';
  warn: number;
  crit: number;
}

export interface PercentagePolicy {
  kind: 'percentage';
  warnPercent: number;
  critPercent: number;
  direction: Direction;
}

/**
 * Levels reported by the monitored device at read time. A level that is
 * missing or equal to `sentinel` falls back to the same level of `configured`.
 */
export interface DeviceReportedPolicy {
  kind: 'device_reported';
  warn?: number;
  crit?: number;
  warnLower?: number;
  critLower?: number;
  sentinel: number;
  configured?: {
    upper?: Levels;
    lower?: Levels;
  };
}

/** Upper and lower levels on the same metric. */
export interface CombinedPolicy {
  kind: 'combined';
  upper?: Levels;
  lower?: Levels;
}

export interface NoLevelsPolicy {
  kind: 'none';
}

export type ThresholdPolicy =
  | FixedPolicy
  | FixedLowerPolicy
  | PercentagePolicy
  | DeviceReportedPolicy
  | CombinedPolicy
  | NoLevelsPolicy;

/** Outcome of comparing one value against one policy. */
export interface LevelsOutcome {
  state: State;
  /** Effective upper levels after resolving percentages and device levels */
  upper?: Levels;
  /** Effective lower levels */
  lower?: Levels;
  /** Which bound produced a non-OK state */
  violated?: Direction;
  /** warn is on the bad side of crit for at least one bound */
  inverted: boolean;
}

/** One performance-data sample. Unset bounds are left out. */
export interface MetricSample {
  name: string;
  value: number;
  warn?: number;
  crit?: number;
  min?: number;
  max?: number;
}

export interface SubResult {
  state: State;
  summary: string;
  details: string;
}

export interface EvaluationResult {
  status: State;
  message: string;
  details: string;
  metrics: MetricSample[];
  results: SubResult[];
}

export type Renderer = (value: number) => string;

export interface Formatting {
  /** Prefix of the summary, e.g. "Temperature" */
  label?: string;
  render: Renderer;
  /** Performance data name; no sample is emitted without one */
  metricName?: string;
  /** Value domain for graphing: [min, max] */
  boundaries?: readonly [min: number | undefined, max: number | undefined];
}

/** Row-oriented table handed over by an external parser. */
export type NormalizedTable = ReadonlyArray<ReadonlyArray<string>>;

export interface Item {
  itemId: string;
  discoveryParams: Record<string, unknown>;
}
