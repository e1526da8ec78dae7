/**
 * Operator parameters -> ThresholdPolicy.
 *
 * This is the collaborator boundary: the loosely shaped parameter mappings
 * operators write (level pairs, percentage pairs, per-group overrides) are
 * validated here and mapped to exactly one policy variant. Nothing past this
 * module sees the raw shapes.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Levels, ThresholdPolicy } from './types.js';

const levelsPair = z.tuple([z.number().finite(), z.number().finite()]);

const baseParamsSchema = z.object({
  /** Upper warn/crit */
  levels: levelsPair.optional(),
  /** Lower warn/crit ("too low is bad") */
  levels_lower: levelsPair.optional(),
  /** Upper warn/crit in percent of the reference (capacity) */
  levels_percent: levelsPair.optional(),
  /** Moving-average backlog in minutes */
  average: z.number().positive().optional(),
});

export const checkParamsSchema = baseParamsSchema.extend({
  /** Per-group overrides, e.g. per phase or per metric */
  groups: z.record(z.string(), baseParamsSchema).optional(),
});

type LevelParams = z.infer<typeof baseParamsSchema>;

export type CheckParams = z.infer<typeof checkParamsSchema>;

/** Factory defaults of a check. Frozen so no caller can mutate them for everyone else. */
export type CheckDefaults = Readonly<CheckParams>;

export function defineDefaults(defaults: CheckParams): CheckDefaults {
  return Object.freeze(defaults);
}

/**
 * Validate operator parameters and lay them over the factory defaults.
 * Unknown keys are dropped; a key of the wrong shape is a ConfigurationError.
 */
export function resolveParams(raw: unknown, defaults: CheckDefaults): CheckParams {
  const parsed = checkParamsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || 'parameters';
    throw new ConfigurationError(`Invalid parameter '${key}': ${issue?.message ?? 'malformed'}`);
  }

  const { groups: defaultGroups, ...defaultLevels } = defaults;
  const { groups: groupOverrides, ...overrides } = parsed.data;

  const groups: Record<string, LevelParams> = { ...defaultGroups };
  for (const [name, group] of Object.entries(groupOverrides ?? {})) {
    groups[name] = layerParams(groups[name] ?? {}, group);
  }

  return { ...layerParams(defaultLevels, overrides), groups };
}

/**
 * `levels` and `levels_percent` both set the upper levels: whichever the
 * operator gives replaces the other one inherited from the defaults.
 */
function layerParams(base: LevelParams, overrides: LevelParams): LevelParams {
  if (!overrides.levels && !overrides.levels_percent) return { ...base, ...overrides };
  const { levels: _levels, levels_percent: _percent, ...rest } = base;
  return { ...rest, ...overrides };
}

/** Parameters for one group (phase, metric, category): group keys override the check-wide ones. */
export function groupParams(params: CheckParams, group: string): CheckParams {
  const { groups, ...common } = params;
  const overrides = groups?.[group];
  return overrides ? layerParams(common, overrides) : common;
}

export function policyFromParams(params: CheckParams): ThresholdPolicy {
  if (params.levels_percent) {
    const [warnPercent, critPercent] = params.levels_percent;
    return { kind: 'percentage', warnPercent, critPercent, direction: 'upper' };
  }
  if (params.levels && params.levels_lower) {
    return { kind: 'combined', upper: params.levels, lower: params.levels_lower };
  }
  if (params.levels) {
    const [warn, crit] = params.levels;
    return { kind: 'fixed', warn, crit, direction: 'upper' };
  }
  if (params.levels_lower) {
    const [warn, crit] = params.levels_lower;
    return { kind: 'fixed_lower', warn, crit };
  }
  return { kind: 'none' };
}

export interface DeviceLevels {
  warn?: number;
  crit?: number;
  warnLower?: number;
  critLower?: number;
}

/** Device-reported levels, falling back to the operator's fixed levels per bound. */
export function deviceReportedPolicy(
  params: CheckParams,
  device: DeviceLevels,
  sentinel: number,
): ThresholdPolicy {
  const upper: Levels | undefined = params.levels;
  const lower: Levels | undefined = params.levels_lower;
  return {
    kind: 'device_reported',
    ...device,
    sentinel,
    configured: { upper, lower },
  };
}
