import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '4100', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Database (counter and average state)
  dbPath: process.env.DB_PATH || './data/check-core.db',

  // Operator check parameters, keyed by check name then item
  checkRulesPath: process.env.CHECK_RULES_PATH || './config/rules.json',

  // Normalized tables dropped by the external parsers: <spool>/<host>/<section>.json
  spoolDir: process.env.SPOOL_DIR || './spool',

  // Monitor
  monitorHosts: (process.env.MONITOR_HOSTS || '').split(',').map((h) => h.trim()).filter(Boolean),
  monitorIntervalMs: parseInt(process.env.MONITOR_INTERVAL_MS || '60000', 10),

  // Consecutive polls an item may be missing before its counters are evicted
  evictAfterMisses: parseInt(process.env.EVICT_AFTER_MISSES || '3', 10),

  // Value a device reports for "no threshold configured"
  deviceLevelSentinel: parseFloat(process.env.DEVICE_LEVEL_SENTINEL || '0'),
} as const;
