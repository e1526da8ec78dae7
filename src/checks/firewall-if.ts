/**
 * Blocked packet counters of firewall interfaces.
 *
 * Section `firewall_if`: [interface, ip4_in_blocked counter]. The counter is
 * turned into packets/s; with the `average` parameter the levels apply to a
 * moving average of that rate.
 */

import { columnRule } from '../check/discovery.js';
import { parseNumber } from '../check/errors.js';
import { defineDefaults, policyFromParams } from '../check/policy.js';
import { fixed } from '../check/render.js';
import type { CheckPlugin } from '../monitor/types.js';

export const firewallIfPlugin: CheckPlugin = {
  name: 'firewall_if',
  section: 'firewall_if',
  discovery: columnRule(0),
  defaults: defineDefaults({ levels: [100, 10000] }),

  check({ row, params, now, evaluator, counterId }) {
    const counter = parseNumber(row[1], 'ip4_in_blocked');

    return evaluator.checkRate(
      counterId('ip4_in_blocked'),
      counter,
      now,
      policyFromParams(params),
      {
        label: 'Incoming IPv4 packets blocked',
        render: fixed(2, ' pkts/s'),
        metricName: 'ip4_in_blocked',
      },
      {
        average: params.average
          ? { backlogMinutes: params.average, averageMetricName: 'ip4_in_blocked_avg' }
          : undefined,
      },
    );
  },
};
