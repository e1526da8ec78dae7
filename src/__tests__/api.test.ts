/**
 * API tests against an ephemeral in-process HTTP server.
 */

import type { Server } from 'node:http';
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { createApp } from '../app.js';
import { builtinPlugins } from '../checks/index.js';
import { MemoryValueStore } from '../db/value-store.js';
import { clearLatestResults, pollHost } from '../monitor/index.js';
import { CheckRunner } from '../monitor/runner.js';
import type { HostTables } from '../monitor/types.js';

const tables: HostTables = {
  temperature: [['cpu', '45']],
  firewall_if: [['eth0', '1000'], ['eth1', '2000']],
};

let server: Server;
let baseUrl: string;
const store = new MemoryValueStore();
const runner = new CheckRunner({ plugins: builtinPlugins, store });

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  await pollHost({
    runner,
    source: { fetchTables: async () => tables },
    hosts: ['fw1'],
    intervalMs: 60_000,
  }, 'fw1');

  server = createApp(runner, store).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  clearLatestResults();
  vi.restoreAllMocks();
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('GET /api/health', () => {
  it('reports the value store and monitor', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      components: {
        valueStore: { status: 'up', counters: 2 },
        monitor: { status: 'stopped' },
      },
    });
  });
});

describe('GET /api/results', () => {
  it('returns the latest results of a host', async () => {
    const res = await fetch(`${baseUrl}/api/results?host=fw1`);
    expect(await res.json()).toMatchObject({
      results: [
        {
          host: 'fw1',
          check: 'temperature',
          item: 'cpu',
          status: 0,
          state: 'OK',
          message: 'Temperature: 45.0 °C',
          metrics: [{ name: 'temp', value: 45, warn: 60, crit: 70 }],
        },
        { check: 'firewall_if', item: 'eth0', message: 'Incoming IPv4 packets blocked: counter initialized at 1000' },
        { check: 'firewall_if', item: 'eth1', state: 'OK' },
      ],
    });
  });

  it('is empty for an unknown host', async () => {
    const body = await (await fetch(`${baseUrl}/api/results?host=nowhere`)).json();
    expect(body).toEqual({ results: [] });
  });
});

describe('GET /api/hosts/:host/inventory', () => {
  it('lists the discovered items', async () => {
    const body = await (await fetch(`${baseUrl}/api/hosts/fw1/inventory`)).json();
    expect(body).toEqual({
      host: 'fw1',
      inventory: {
        temperature: [{ itemId: 'cpu', discoveryParams: {} }],
        firewall_if: [
          { itemId: 'eth0', discoveryParams: {} },
          { itemId: 'eth1', discoveryParams: {} },
        ],
      },
    });
  });
});

describe('POST /api/evaluate', () => {
  it('evaluates a value against a policy', async () => {
    const res = await post('/api/evaluate', {
      value: 85,
      policy: { kind: 'fixed', warn: 80, crit: 90 },
      label: 'CPU',
      unit: '%',
      precision: 1,
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 1,
      state: 'WARN',
      message: 'CPU: 85.0 % (warn/crit at 80.0 %/90.0 %)(!)',
      details: 'CPU: 85.0 % (warn/crit at 80.0 %/90.0 %)',
      metrics: [],
    });
  });

  it('reports a percentage policy without reference as UNKNOWN', async () => {
    const res = await post('/api/evaluate', {
      value: 10,
      policy: { kind: 'percentage', warnPercent: 80, critPercent: 90 },
      metricName: 'used',
    });
    expect(await res.json()).toMatchObject({
      state: 'UNKNOWN',
      message: 'Percentage levels require a reference value(?)',
    });
  });

  it('rejects a malformed request', async () => {
    const res = await post('/api/evaluate', { value: 'high', policy: { kind: 'fixed' } });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'Invalid request',
      issues: expect.arrayContaining([expect.objectContaining({ path: ['value'] })]),
    });
  });
});

describe('DELETE eviction routes', () => {
  it('evicts one item', async () => {
    const res = await fetch(`${baseUrl}/api/hosts/fw1/items/firewall_if/eth1`, { method: 'DELETE' });
    expect(await res.json()).toEqual({ host: 'fw1', check: 'firewall_if', item: 'eth1', removed: 1 });
    expect(store.size()).toBe(1);
  });

  it('evicts a check', async () => {
    const res = await fetch(`${baseUrl}/api/hosts/fw1/items/temperature`, { method: 'DELETE' });
    expect(await res.json()).toEqual({ host: 'fw1', check: 'temperature', item: null, removed: 0 });
  });

  it('evicts a host', async () => {
    const res = await fetch(`${baseUrl}/api/hosts/fw1`, { method: 'DELETE' });
    expect(await res.json()).toEqual({ host: 'fw1', removed: 1 });
    expect(store.size()).toBe(0);
    const inventory = await fetch(`${baseUrl}/api/hosts/fw1/inventory`);
    expect(await inventory.json()).toEqual({ host: 'fw1', inventory: {} });
  });
});
