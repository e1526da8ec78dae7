/**
 * Threshold policy evaluation.
 *
 * Boundaries are inclusive on the bad side: a value equal to warn is WARN,
 * equal to crit is CRIT. CRIT's condition is always tested first, so an
 * inverted pair (warn worse than crit) still ends up at the more severe state
 * instead of being reordered behind the operator's back.
 */

import { ConfigurationError, assertFinite } from './errors.js';
import { State, type Levels, type LevelsOutcome, type ThresholdPolicy, type DeviceReportedPolicy } from './types.js';

interface Bounds {
  upper?: Levels;
  lower?: Levels;
}

function checkLevels(levels: Levels, what: string): Levels {
  const [warn, crit] = levels;
  if (!Number.isFinite(warn) || !Number.isFinite(crit)) {
    throw new ConfigurationError(`Invalid ${what} levels: warn/crit must be numbers, got ${warn}/${crit}`);
  }
  return levels;
}

function deviceValue(value: number | undefined, sentinel: number): number | undefined {
  if (value === undefined || !Number.isFinite(value) || value === sentinel) return undefined;
  return value;
}

/** Each level the device reports wins; an unset one is taken from the configured pair. */
function devicePair(
  warn: number | undefined,
  crit: number | undefined,
  sentinel: number,
  configured: Levels | undefined,
): Levels | undefined {
  const w = deviceValue(warn, sentinel) ?? configured?.[0];
  const c = deviceValue(crit, sentinel) ?? configured?.[1];
  return w !== undefined && c !== undefined ? [w, c] : undefined;
}

function resolveDeviceReported(policy: DeviceReportedPolicy): Bounds {
  const upper = devicePair(policy.warn, policy.crit, policy.sentinel, policy.configured?.upper);
  const lower = devicePair(policy.warnLower, policy.critLower, policy.sentinel, policy.configured?.lower);
  return {
    upper: upper && checkLevels(upper, 'upper'),
    lower: lower && checkLevels(lower, 'lower'),
  };
}

/**
 * Reduce any policy to plain upper/lower levels.
 * Percentage policies need the reference (capacity) the percentages apply to.
 */
export function resolveBounds(policy: ThresholdPolicy, reference?: number): Bounds {
  switch (policy.kind) {
    case 'none':
      return {};

    case 'fixed': {
      const levels = checkLevels([policy.warn, policy.crit], policy.direction);
      return policy.direction === 'upper' ? { upper: levels } : { lower: levels };
    }

    case 'fixed_lower':
      return { lower: checkLevels([policy.warn, policy.crit], 'lower') };

    case 'percentage': {
      if (reference === undefined || !Number.isFinite(reference)) {
        throw new ConfigurationError('Percentage levels require a reference value');
      }
      if (reference <= 0) {
        throw new ConfigurationError(`Percentage levels require a positive reference value, got ${reference}`);
      }
      checkLevels([policy.warnPercent, policy.critPercent], 'percentage');
      const levels: Levels = [
        (policy.warnPercent / 100) * reference,
        (policy.critPercent / 100) * reference,
      ];
      return policy.direction === 'upper' ? { upper: levels } : { lower: levels };
    }

    case 'device_reported':
      return resolveDeviceReported(policy);

    case 'combined':
      return {
        upper: policy.upper && checkLevels(policy.upper, 'upper'),
        lower: policy.lower && checkLevels(policy.lower, 'lower'),
      };
  }
}

export function evaluateLevels(value: number, policy: ThresholdPolicy, reference?: number): LevelsOutcome {
  assertFinite(value, 'value');
  const { upper, lower } = resolveBounds(policy, reference);

  let state = State.OK;
  let violated: LevelsOutcome['violated'];

  if (upper) {
    const [warn, crit] = upper;
    if (value >= crit) {
      state = State.CRIT;
      violated = 'upper';
    } else if (value >= warn) {
      state = State.WARN;
      violated = 'upper';
    }
  }

  if (lower && state !== State.CRIT) {
    const [warn, crit] = lower;
    if (value <= crit) {
      state = State.CRIT;
      violated = 'lower';
    } else if (value <= warn && state === State.OK) {
      state = State.WARN;
      violated = 'lower';
    }
  }

  const inverted = (upper !== undefined && upper[0] > upper[1]) || (lower !== undefined && lower[0] < lower[1]);

  return { state, upper, lower, violated, inverted };
}
