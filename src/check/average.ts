/**
 * Time-weighted exponential moving average persisted in the Value Store.
 *
 * The backlog is the half-life of a sample: after `backlogMinutes` an older
 * average weighs half as much as the newest value. Samples are irregular, so
 * the smoothing factor is derived from the elapsed time of each update.
 */

import type { RateState, ValueStore } from '../db/value-store.js';
import { assertFinite, ConfigurationError } from './errors.js';

export class Averager {
  constructor(private readonly store: ValueStore) {}

  average(counterId: string, value: number, timestamp: number, backlogMinutes: number): number {
    assertFinite(value, counterId);
    if (!Number.isFinite(backlogMinutes) || backlogMinutes <= 0) {
      throw new ConfigurationError(`Averaging backlog must be a positive number of minutes, got ${backlogMinutes}`);
    }

    let previous: RateState | undefined;
    try {
      previous = this.store.get(counterId);
    } catch (err) {
      console.warn(`[Averager] Value store unavailable for ${counterId}:`, err instanceof Error ? err.message : err);
      previous = undefined;
    }

    if (!previous) {
      this.persist(counterId, value, timestamp);
      return value;
    }

    const dt = timestamp - previous.lastTimestamp;
    if (dt <= 0) return previous.lastValue;

    const halfLife = backlogMinutes * 60;
    const alpha = 1 - Math.exp((-Math.LN2 * dt) / halfLife);
    const averaged = previous.lastValue + alpha * (value - previous.lastValue);

    this.persist(counterId, averaged, timestamp);
    return averaged;
  }

  private persist(counterId: string, value: number, timestamp: number): void {
    try {
      this.store.put(counterId, { counterId, lastValue: value, lastTimestamp: timestamp });
    } catch (err) {
      console.warn(`[Averager] Could not persist ${counterId}:`, err instanceof Error ? err.message : err);
    }
  }
}
