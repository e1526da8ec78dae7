import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { checkLevels } from '../check/evaluator.js';
import { fixed } from '../check/render.js';
import { STATE_NAMES, type EvaluationResult } from '../check/types.js';
import type { ValueStore } from '../db/value-store.js';
import { getLatestResults } from '../monitor/index.js';
import type { CheckRunner } from '../monitor/runner.js';
import { createHealthRouter } from './health.js';

const levels = z.tuple([z.number(), z.number()]);
const direction = z.enum(['upper', 'lower']);

const policySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('fixed'), warn: z.number(), crit: z.number(), direction: direction.default('upper') }),
  z.object({ kind: z.literal('fixed_lower'), warn: z.number(), crit: z.number() }),
  z.object({
    kind: z.literal('percentage'),
    warnPercent: z.number(),
    critPercent: z.number(),
    direction: direction.default('upper'),
  }),
  z.object({
    kind: z.literal('device_reported'),
    warn: z.number().optional(),
    crit: z.number().optional(),
    warnLower: z.number().optional(),
    critLower: z.number().optional(),
    sentinel: z.number().default(0),
    configured: z.object({ upper: levels.optional(), lower: levels.optional() }).optional(),
  }),
  z.object({ kind: z.literal('combined'), upper: levels.optional(), lower: levels.optional() }),
]);

const evaluateBodySchema = z.object({
  value: z.number(),
  policy: policySchema,
  reference: z.number().optional(),
  label: z.string().optional(),
  unit: z.string().optional(),
  precision: z.number().int().min(0).max(10).default(2),
  metricName: z.string().optional(),
});

export function serializeResult(result: EvaluationResult) {
  return {
    status: result.status,
    state: STATE_NAMES[result.status],
    message: result.message,
    details: result.details,
    metrics: result.metrics,
  };
}

/**
 * REST API for the reporting and inventory layers:
 *  - results of the latest poll
 *  - ad-hoc evaluation of a value against a policy
 *  - explicit eviction of vanished items and their counter state
 */
export function createApiRouter(runner: CheckRunner, store: ValueStore): Router {
  const router = Router();

  router.use('/api/health', createHealthRouter(store));

  router.get('/api/results', (req: Request, res: Response) => {
    const host = typeof req.query.host === 'string' ? req.query.host : undefined;
    const results = getLatestResults(host).map((r) => ({
      host: r.host,
      check: r.check,
      item: r.item,
      timestamp: r.timestamp,
      ...serializeResult(r.result),
    }));
    res.json({ results });
  });

  router.get('/api/hosts/:host/inventory', (req: Request, res: Response) => {
    res.json({ host: req.params.host, inventory: runner.getInventory(req.params.host) });
  });

  router.post('/api/evaluate', (req: Request, res: Response) => {
    const parsed = evaluateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      return;
    }

    const body = parsed.data;
    const result = checkLevels(body.value, body.policy, {
      label: body.label,
      render: fixed(body.precision, body.unit ? ` ${body.unit}` : ''),
      metricName: body.metricName,
    }, body.reference);
    res.json(serializeResult(result));
  });

  router.delete('/api/hosts/:host/items/:check/:item?', (req, res) => {
    const { host, check, item } = req.params;
    const removed = runner.evictItem(host, check, item);
    res.json({ host, check, item: item ?? null, removed });
  });

  router.delete('/api/hosts/:host', (req: Request, res: Response) => {
    const removed = runner.evictItem(req.params.host);
    res.json({ host: req.params.host, removed });
  });

  return router;
}
