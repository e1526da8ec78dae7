/**
 * Monitor lifecycle management.
 *
 * Polls every configured host on a fixed interval: fetch its tables from the
 * TableSource, run one CheckRunner cycle, keep the latest results in memory.
 * A host whose previous poll is still running is skipped, not stacked.
 * Errors are logged and never propagate out of the loop.
 */

import type { CheckRunner } from './runner.js';
import type { TableSource } from './table-source.js';
import type { ServiceResult } from './types.js';

export interface MonitorOptions {
  runner: CheckRunner;
  source: TableSource;
  hosts: string[];
  intervalMs: number;
  onResults?: (host: string, results: ServiceResult[]) => void;
}

let timer: ReturnType<typeof setInterval> | null = null;
let running = false;
const inFlight = new Set<string>();

/** Latest results per host */
const latestResults = new Map<string, ServiceResult[]>();

/**
 * Poll one host once. Resolves with its results, or with an empty list when
 * the host was skipped or its tables could not be fetched.
 */
export async function pollHost(options: MonitorOptions, host: string): Promise<ServiceResult[]> {
  if (inFlight.has(host)) {
    console.warn(`[Monitor] Previous poll of ${host} still running, skipping`);
    return [];
  }
  inFlight.add(host);

  try {
    const tables = await options.source.fetchTables(host);
    const results = options.runner.pollHost(host, tables, Date.now() / 1000);
    latestResults.set(host, results);
    options.onResults?.(host, results);
    return results;
  } catch (err) {
    console.error(`[Monitor] Poll of ${host} failed:`, err instanceof Error ? err.message : err);
    return [];
  } finally {
    inFlight.delete(host);
  }
}

export async function pollAll(options: MonitorOptions): Promise<void> {
  await Promise.all(options.hosts.map((host) => pollHost(options, host)));
}

/**
 * Start the polling loop. The first poll runs immediately.
 */
export function startMonitor(options: MonitorOptions): void {
  if (running) {
    console.warn('[Monitor] Already running, skipping start');
    return;
  }
  if (options.hosts.length === 0) {
    console.warn('[Monitor] No hosts configured, monitor not started');
    return;
  }

  const poll = () => {
    pollAll(options).catch((err) =>
      console.error('[Monitor] Poll cycle error:', err instanceof Error ? err.message : err),
    );
  };

  poll();
  timer = setInterval(poll, options.intervalMs);
  running = true;
  console.log(`[Monitor] Polling ${options.hosts.length} host(s) every ${options.intervalMs}ms`);
}

export function stopMonitor(): void {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }
  running = false;
  console.log('[Monitor] Stopped');
}

export function isMonitorRunning(): boolean {
  return running;
}

export function getLatestResults(host?: string): ServiceResult[] {
  if (host !== undefined) return latestResults.get(host) ?? [];
  return [...latestResults.values()].flat();
}

/** Drop stored results of a host (or of everything) */
export function clearLatestResults(host?: string): void {
  if (host !== undefined) latestResults.delete(host);
  else latestResults.clear();
}
