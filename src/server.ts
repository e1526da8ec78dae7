import { createServer } from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { builtinPlugins } from './checks/index.js';
import { loadCheckRules } from './check/rules.js';
import { openDatabase } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { MemoryValueStore, SqliteValueStore, type ValueStore } from './db/value-store.js';
import { startMonitor, stopMonitor } from './monitor/index.js';
import { CheckRunner } from './monitor/runner.js';
import { SpoolTableSource } from './monitor/table-source.js';

// Open the counter database; without it rates restart from scratch after every restart
let store: ValueStore;
let closeDatabase: () => void = () => {};
try {
  const handle = openDatabase(config.dbPath);
  await runMigrations(handle);
  store = new SqliteValueStore(handle.db);
  closeDatabase = () => handle.sqlite.close();
  console.log(`[Database] Counter state in ${config.dbPath}`);
} catch (err) {
  console.error('Failed to open counter database:', err);
  console.warn('Starting without persistence -- counter state will not survive a restart');
  store = new MemoryValueStore();
}

const runner = new CheckRunner({
  plugins: builtinPlugins,
  store,
  rules: loadCheckRules(config.checkRulesPath),
  deviceLevelSentinel: config.deviceLevelSentinel,
  evictAfterMisses: config.evictAfterMisses,
});

const app = createApp(runner, store);
const server = createServer(app);

server.listen(config.port, () => {
  console.log(`check-core listening on port ${config.port} (${config.nodeEnv})`);
  console.log(`  Plugins: ${builtinPlugins.map((p) => p.name).join(', ')}`);
});

startMonitor({
  runner,
  source: new SpoolTableSource(config.spoolDir),
  hosts: config.monitorHosts,
  intervalMs: config.monitorIntervalMs,
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  stopMonitor();
  server.close(() => {
    closeDatabase();
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
