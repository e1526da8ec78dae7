import { Router } from 'express';
import { isMonitorRunning } from '../monitor/index.js';
import type { ValueStore } from '../db/value-store.js';

const version = process.env.npm_package_version ?? '1.0.0';

export function createHealthRouter(store: ValueStore): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    let counters: number | null = null;
    let storeStatus: 'up' | 'down' = 'up';
    try {
      counters = store.size();
    } catch (err) {
      storeStatus = 'down';
      console.warn('[Health] Value store check failed:', err instanceof Error ? err.message : err);
    }

    res.json({
      status: storeStatus === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version,
      components: {
        valueStore: { status: storeStatus, counters },
        monitor: { status: isMonitorRunning() ? 'running' : 'stopped' },
      },
    });
  });

  return router;
}
