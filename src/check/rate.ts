/**
 * Rate Calculator -- turns a monotonically increasing counter sampled at
 * irregular intervals into a per-second rate.
 *
 * - First sample of a counter: stored, no rate.
 * - Zero or negative elapsed time: no division; the rate already computed for
 *   the counter in the current poll cycle is returned if there is one. Stored
 *   state is left untouched.
 * - Counter lower than last time: treated as restarted from zero (device
 *   reboot, 32-bit wrap), so the delta is the new value itself. A counter that
 *   legitimately decreases without restarting is misread by this heuristic;
 *   the normalized table offers no reboot indicator to tell the two apart.
 */

import type { ValueStore, RateState } from '../db/value-store.js';
import { assertFinite } from './errors.js';

export interface RateSample {
  rate: number | undefined;
  isFirstSample: boolean;
}

export class RateCalculator {
  /** Rates computed in the open poll cycle; null when no cycle is open */
  private cycleRates: Map<string, number> | null = null;

  constructor(private readonly store: ValueStore) {}

  /** Start a poll cycle. Rates computed until endCycle() serve the zero-duration guard. */
  beginCycle(): void {
    this.cycleRates = new Map();
  }

  endCycle(): void {
    this.cycleRates = null;
  }

  rate(counterId: string, value: number, timestamp: number): RateSample {
    assertFinite(value, counterId);
    assertFinite(timestamp, `${counterId} timestamp`);

    const previous = this.read(counterId);

    if (!previous) {
      this.write(counterId, { counterId, lastValue: value, lastTimestamp: timestamp });
      return { rate: undefined, isFirstSample: true };
    }

    const dt = timestamp - previous.lastTimestamp;
    if (dt <= 0) {
      return { rate: this.cycleRates?.get(counterId), isFirstSample: false };
    }

    const delta = value < previous.lastValue ? value : value - previous.lastValue;
    const rate = delta / dt;

    this.write(counterId, { counterId, lastValue: value, lastTimestamp: timestamp });
    this.cycleRates?.set(counterId, rate);

    return { rate, isFirstSample: false };
  }

  private read(counterId: string): RateState | undefined {
    try {
      return this.store.get(counterId);
    } catch (err) {
      console.warn(`[RateCalculator] Value store unavailable for ${counterId}:`, err instanceof Error ? err.message : err);
      return undefined;
    }
  }

  private write(counterId: string, state: RateState): void {
    try {
      this.store.put(counterId, state);
    } catch (err) {
      console.warn(`[RateCalculator] Could not persist ${counterId}:`, err instanceof Error ? err.message : err);
    }
  }
}
