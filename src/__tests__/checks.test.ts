/**
 * Tests for the built-in check plugins, run through the CheckRunner the way
 * the monitor runs them.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { builtinPlugins } from '../checks/index.js';
import { State } from '../check/types.js';
import { MemoryValueStore } from '../db/value-store.js';
import { CheckRunner } from '../monitor/runner.js';
import type { HostTables, ServiceResult } from '../monitor/types.js';

let runner: CheckRunner;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  runner = new CheckRunner({ plugins: builtinPlugins, store: new MemoryValueStore() });
});

afterEach(() => {
  vi.restoreAllMocks();
});

function poll(tables: HostTables, now = 100): Map<string, ServiceResult['result']> {
  return new Map(runner.pollHost('ups1', tables, now).map((r) => [r.item, r.result]));
}

describe('temperature', () => {
  it('uses the levels the device reports', () => {
    const results = poll({ temperature: [['cpu', '62', '65', '75', '', '']] });
    expect(results.get('cpu')?.status).toBe(State.OK);
    expect(results.get('cpu')?.message).toBe('Temperature: 62.0 °C');
    expect(results.get('cpu')?.metrics).toEqual([{ name: 'temp', value: 62, warn: 65, crit: 75 }]);
  });

  it('falls back to the configured levels for unset device levels', () => {
    const results = poll({ temperature: [['board', '72', '0', '0', '', '']] });
    expect(results.get('board')?.status).toBe(State.CRIT);
    expect(results.get('board')?.message).toBe('Temperature: 72.0 °C (warn/crit at 60.0 °C/70.0 °C)(!!)');
  });

  it('checks lower levels reported by the device', () => {
    const results = poll({ temperature: [['intake', '4', '', '', '10', '5']] });
    expect(results.get('intake')?.message).toBe('Temperature: 4.0 °C (warn/crit below 10.0 °C/5.0 °C)(!!)');
  });

  it('honours the configured sentinel', () => {
    runner = new CheckRunner({ plugins: builtinPlugins, store: new MemoryValueStore(), deviceLevelSentinel: -1 });
    const results = poll({ temperature: [['cpu', '62', '-1', '-1']] });
    expect(results.get('cpu')?.status).toBe(State.WARN);
  });
});

describe('filesystem', () => {
  it('applies percentage levels to the filesystem size', () => {
    const results = poll({ df: [['/', '1000', '850'], ['/proc', '0', '0']] });
    expect([...results.keys()]).toEqual(['/']);
    expect(results.get('/')?.status).toBe(State.WARN);
    expect(results.get('/')?.message).toBe('Used: 850.00 MiB (warn/crit at 800.00 MiB/900.00 MiB)(!)');
    expect(results.get('/')?.metrics).toEqual([
      { name: 'fs_used', value: 850, warn: 800, crit: 900, min: 0, max: 1000 },
    ]);
  });

  it('honours absolute operator levels over the default percentages', () => {
    runner.setRules({ filesystem: { '/': { levels: [500, 800] } } });
    const results = poll({ df: [['/', '1000', '850']] });
    expect(results.get('/')?.status).toBe(State.CRIT);
    expect(results.get('/')?.message).toBe('Used: 850.00 MiB (warn/crit at 500.00 MiB/800.00 MiB)(!!)');
    expect(results.get('/')?.metrics).toEqual([
      { name: 'fs_used', value: 850, warn: 500, crit: 800, min: 0, max: 1000 },
    ]);
  });

  it('checks the free space against lower levels', () => {
    runner.setRules({ filesystem: { '/': { levels_lower: [200, 100] } } });
    const results = poll({ df: [['/', '1000', '850']] });
    expect(results.get('/')?.message).toBe(
      'Used: 850.00 MiB (warn/crit at 800.00 MiB/900.00 MiB)(!), Free: 150.00 MiB (warn/crit below 200.00 MiB/100.00 MiB)(!)',
    );
    expect(results.get('/')?.metrics).toEqual([
      { name: 'fs_used', value: 850, warn: 800, crit: 900, min: 0, max: 1000 },
      { name: 'fs_free', value: 150, min: 0, max: 1000 },
    ]);
  });
});

describe('firewall_if', () => {
  it('initializes the counter on the first poll', () => {
    const results = poll({ firewall_if: [['ext', '5000']] });
    expect(results.get('ext')?.message).toBe('Incoming IPv4 packets blocked: counter initialized at 5000');
    expect(results.get('ext')?.metrics).toEqual([]);
  });

  it('survives a counter reset', () => {
    poll({ firewall_if: [['ext', '4000000000']] }, 100);
    const results = poll({ firewall_if: [['ext', '50']] }, 110);
    expect(results.get('ext')?.message).toBe('Incoming IPv4 packets blocked: 5.00 pkts/s');
  });
});

describe('electrical_phases', () => {
  it('checks every measured quantity of a phase', () => {
    const results = poll({ phases: [['L1', '230', '10', '2300']] });
    expect(results.get('L1')?.status).toBe(State.OK);
    expect(results.get('L1')?.message).toBe('Voltage: 230.0 V, Current: 10.0 A, Power: 2300.000 W');
    expect(results.get('L1')?.metrics.map((m) => m.name)).toEqual(['voltage', 'current', 'power']);
    expect(runner.getInventory('ups1').electrical_phases).toEqual([
      { itemId: 'L1', discoveryParams: { nominalVoltage: 230 } },
    ]);
  });

  it('derives voltage levels from the discovered voltage', () => {
    poll({ phases: [['L1', '230', '10', '2300']] });
    const results = poll({ phases: [['L1', '200', '17', '']] }, 160);

    expect(results.get('L1')?.status).toBe(State.WARN);
    expect(results.get('L1')?.message).toBe(
      'Voltage: 200.0 V (warn/crit below 207.0 V/184.0 V)(!), Current: 17.0 A (warn/crit at 16.0 A/20.0 A)(!)',
    );
    expect(results.get('L1')?.metrics).toEqual([
      { name: 'voltage', value: 200 },
      { name: 'current', value: 17, warn: 16, crit: 20 },
    ]);
  });

  it('uses operator levels per group', () => {
    runner.setRules({ electrical_phases: { '*': { groups: { power: { levels: [2000, 2500] } } } } });
    const results = poll({ phases: [['L1', '230', '10', '2300']] });
    expect(results.get('L1')?.message).toBe(
      'Voltage: 230.0 V, Current: 10.0 A, Power: 2300.000 W (warn/crit at 2000.000 W/2500.000 W)(!)',
    );
  });

  it('keeps the other quantities when one cannot be parsed', () => {
    const results = poll({ phases: [['L3', 'x', '5', '']] });
    expect(results.get('L3')?.status).toBe(State.UNKNOWN);
    expect(results.get('L3')?.message).toBe("Voltage: Invalid value for voltage: 'x'(?), Current: 5.0 A");
  });

  it('is UNKNOWN for a phase without measurements', () => {
    const results = poll({ phases: [['L2', '', '', '']] });
    expect(results.get('L2')?.message).toBe('No measurements for this phase(?)');
  });
});
