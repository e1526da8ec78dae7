import express, { type Express } from 'express';
import type { ValueStore } from './db/value-store.js';
import type { CheckRunner } from './monitor/runner.js';
import { createApiRouter } from './api/routes.js';

/** Express app serving the results/evaluation/eviction API. */
export function createApp(runner: CheckRunner, store: ValueStore): Express {
  const app = express();
  app.use(express.json());
  app.use(createApiRouter(runner, store));
  return app;
}
