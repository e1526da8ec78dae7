/**
 * Electrical phases of a UPS or PDU: voltage, current and power per phase,
 * each with its own levels under `groups.voltage`, `groups.current` and
 * `groups.power`. The phase state is the worst of the three.
 *
 * Section `phases`: [phase, voltage V, current A, power W]; empty cells
 * mean the device does not measure that quantity.
 *
 * Without operator voltage levels, lower levels are derived from the voltage
 * seen when the phase was discovered (90% / 80% of it).
 */

import { columnRule } from '../check/discovery.js';
import { errorMessage, parseOptionalNumber } from '../check/errors.js';
import { aggregate, unknownResult } from '../check/evaluator.js';
import { defineDefaults, groupParams, policyFromParams, type CheckParams } from '../check/policy.js';
import { fixed } from '../check/render.js';
import type { EvaluationResult, Renderer } from '../check/types.js';
import type { CheckContext, CheckPlugin } from '../monitor/types.js';

interface PhaseMetric {
  group: 'voltage' | 'current' | 'power';
  column: number;
  label: string;
  render: Renderer;
}

const PHASE_METRICS: PhaseMetric[] = [
  { group: 'voltage', column: 1, label: 'Voltage', render: fixed(1, ' V') },
  { group: 'current', column: 2, label: 'Current', render: fixed(1, ' A') },
  { group: 'power', column: 3, label: 'Power', render: fixed(3, ' W') },
];

function voltageParams(params: CheckParams, discoveryParams: Record<string, unknown>): CheckParams {
  const voltage = groupParams(params, 'voltage');
  const nominal = discoveryParams.nominalVoltage;
  if (voltage.levels || voltage.levels_lower || typeof nominal !== 'number') return voltage;
  return { ...voltage, levels_lower: [nominal * 0.9, nominal * 0.8] };
}

function checkMetric(ctx: CheckContext, metric: PhaseMetric): EvaluationResult | null {
  try {
    const value = parseOptionalNumber(ctx.row[metric.column], metric.group);
    if (value === undefined) return null;

    const params = metric.group === 'voltage'
      ? voltageParams(ctx.params, ctx.discoveryParams)
      : groupParams(ctx.params, metric.group);

    return ctx.evaluator.check(value, policyFromParams(params), {
      label: metric.label,
      render: metric.render,
      metricName: metric.group,
    });
  } catch (err) {
    return unknownResult(`${metric.label}: ${errorMessage(err)}`);
  }
}

export const electricalPhasesPlugin: CheckPlugin = {
  name: 'electrical_phases',
  section: 'phases',
  discovery: columnRule(0, {
    params: (row) => {
      const voltage = Number(row[1]);
      return Number.isFinite(voltage) && voltage > 0 ? { nominalVoltage: voltage } : {};
    },
  }),
  defaults: defineDefaults({
    groups: {
      current: { levels: [16, 20] },
    },
  }),

  check(ctx) {
    const results = PHASE_METRICS
      .map((metric) => checkMetric(ctx, metric))
      .filter((r): r is EvaluationResult => r !== null);

    if (results.length === 0) return unknownResult('No measurements for this phase');
    return aggregate(results);
  },
};
