// Public API of the evaluation core

export * from './check/types.js';
export { CheckError, ConfigurationError, DataError, parseNumber, parseOptionalNumber } from './check/errors.js';
export { evaluateLevels, resolveBounds } from './check/levels.js';
export { RateCalculator, type RateSample } from './check/rate.js';
export { Averager } from './check/average.js';
export {
  Evaluator,
  aggregate,
  checkLevels,
  okResult,
  unknownResult,
  worstState,
  type AverageOptions,
  type RateOptions,
} from './check/evaluator.js';
export * as render from './check/render.js';
export { columnRule, discover, findRow, type DiscoveryRule, type Row } from './check/discovery.js';
export {
  checkParamsSchema,
  defineDefaults,
  deviceReportedPolicy,
  groupParams,
  policyFromParams,
  resolveParams,
  type CheckDefaults,
  type CheckParams,
  type DeviceLevels,
} from './check/policy.js';
export { loadCheckRules, parseCheckRules, rulesFor, type CheckRules } from './check/rules.js';

export { openDatabase, type DatabaseHandle } from './db/index.js';
export { runMigrations, createTables } from './db/migrate.js';
export {
  MemoryValueStore,
  SqliteValueStore,
  counterId,
  counterPrefix,
  type CounterKey,
  type RateState,
  type ValueStore,
} from './db/value-store.js';

export { CheckRunner, type CheckRunnerOptions } from './monitor/runner.js';
export { ItemPresenceTracker } from './monitor/presence-tracker.js';
export { SpoolTableSource, type TableSource } from './monitor/table-source.js';
export { startMonitor, stopMonitor, pollAll, pollHost, getLatestResults, isMonitorRunning } from './monitor/index.js';
export type { CheckContext, CheckPlugin, HostTables, ServiceResult } from './monitor/types.js';
export { builtinPlugins } from './checks/index.js';
export { createApp } from './app.js';
