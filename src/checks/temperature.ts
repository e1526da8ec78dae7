/**
 * Temperature sensors with levels reported by the device.
 *
 * Section `temperature`, one row per sensor:
 *   [sensor, value °C, dev warn, dev crit, dev warn lower, dev crit lower]
 * Device levels win over the operator's levels level by level; a device
 * level equal to the sentinel (usually 0) means "not set on the device".
 */

import { columnRule } from '../check/discovery.js';
import { parseNumber, parseOptionalNumber } from '../check/errors.js';
import { defineDefaults, deviceReportedPolicy } from '../check/policy.js';
import { fixed } from '../check/render.js';
import type { CheckPlugin } from '../monitor/types.js';

export const temperaturePlugin: CheckPlugin = {
  name: 'temperature',
  section: 'temperature',
  discovery: columnRule(0),
  defaults: defineDefaults({ levels: [60, 70] }),

  check({ row, params, evaluator, deviceLevelSentinel }) {
    const value = parseNumber(row[1], 'temperature');
    const policy = deviceReportedPolicy(params, {
      warn: parseOptionalNumber(row[2], 'device warn level'),
      crit: parseOptionalNumber(row[3], 'device crit level'),
      warnLower: parseOptionalNumber(row[4], 'device lower warn level'),
      critLower: parseOptionalNumber(row[5], 'device lower crit level'),
    }, deviceLevelSentinel);

    return evaluator.check(value, policy, {
      label: 'Temperature',
      render: fixed(1, ' °C'),
      metricName: 'temp',
    });
  },
};
