/**
 * Filesystem usage with levels in percent of the filesystem size, plus
 * optional lower levels on the free space (`levels_lower`, in MiB).
 *
 * Section `df`: [mount point, size MiB, used MiB].
 */

import { columnRule } from '../check/discovery.js';
import { parseNumber } from '../check/errors.js';
import { aggregate } from '../check/evaluator.js';
import { defineDefaults, policyFromParams } from '../check/policy.js';
import { bytes } from '../check/render.js';
import type { Renderer } from '../check/types.js';
import type { CheckPlugin } from '../monitor/types.js';

const MIB = 1024 * 1024;

const mebibytes: Renderer = (mib) => bytes(mib * MIB);

export const filesystemPlugin: CheckPlugin = {
  name: 'filesystem',
  section: 'df',
  discovery: columnRule(0, {
    // pseudo filesystems report a size of 0
    filter: (row) => Number(row[1]) > 0,
  }),
  defaults: defineDefaults({ levels_percent: [80, 90] }),

  check({ row, params, evaluator }) {
    const size = parseNumber(row[1], 'size');
    const used = parseNumber(row[2], 'used');
    const { levels_lower: freeLevels, ...usedParams } = params;

    const usage = evaluator.check(used, policyFromParams(usedParams), {
      label: 'Used',
      render: mebibytes,
      metricName: 'fs_used',
      boundaries: [0, size],
    }, size);
    if (!freeLevels) return usage;

    const [warn, crit] = freeLevels;
    const free = evaluator.check(size - used, { kind: 'fixed_lower', warn, crit }, {
      label: 'Free',
      render: mebibytes,
      metricName: 'fs_free',
      boundaries: [0, size],
    });
    return aggregate([usage, free]);
  },
};
