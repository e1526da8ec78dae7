/**
 * Evaluator -- value + threshold policy + formatting -> status, message and
 * performance data.
 *
 * Stateless per invocation: cross-poll state lives in the Value Store and is
 * only reached through the Rate Calculator and the Averager. Every failure is
 * turned into an UNKNOWN sub-result, so one bad metric never hides the others.
 */

import type { Averager } from './average.js';
import { CheckError, errorMessage } from './errors.js';
import { evaluateLevels } from './levels.js';
import type { RateCalculator } from './rate.js';
import {
  State,
  type EvaluationResult,
  type Formatting,
  type LevelsOutcome,
  type MetricSample,
  type SubResult,
  type ThresholdPolicy,
} from './types.js';

const STATE_MARKERS: Record<State, string> = {
  [State.OK]: '',
  [State.WARN]: '(!)',
  [State.CRIT]: '(!!)',
  [State.UNKNOWN]: '(?)',
};

function withLabel(label: string | undefined, text: string): string {
  return label ? `${label}: ${text}` : text;
}

/** Worst state wins; severity follows the numeric value of State. */
export function worstState(states: Iterable<State>): State {
  let worst = State.OK;
  for (const state of states) {
    if (state > worst) worst = state;
  }
  return worst;
}

function composeMessage(results: SubResult[]): string {
  return results.map((r) => `${r.summary}${STATE_MARKERS[r.state]}`).join(', ');
}

export function fromSubResults(results: SubResult[], metrics: MetricSample[] = []): EvaluationResult {
  return {
    status: worstState(results.map((r) => r.state)),
    message: composeMessage(results),
    details: results.map((r) => r.details).join('\n'),
    metrics,
    results,
  };
}

export function okResult(summary: string): EvaluationResult {
  return fromSubResults([{ state: State.OK, summary, details: summary }]);
}

export function unknownResult(summary: string): EvaluationResult {
  return fromSubResults([{ state: State.UNKNOWN, summary, details: summary }]);
}

/**
 * Combine independently evaluated metrics: worst state, every summary kept,
 * all performance samples concatenated.
 */
export function aggregate(results: EvaluationResult[]): EvaluationResult {
  if (results.length === 0) return okResult('No metrics to evaluate');
  return fromSubResults(
    results.flatMap((r) => r.results),
    results.flatMap((r) => r.metrics),
  );
}

function failure(label: string | undefined, err: unknown): EvaluationResult {
  if (!(err instanceof CheckError)) {
    console.error('[Evaluator] Unexpected evaluation error:', errorMessage(err));
  }
  return unknownResult(withLabel(label, errorMessage(err)));
}

function metricSample(
  name: string,
  value: number,
  outcome: LevelsOutcome,
  boundaries: Formatting['boundaries'],
): MetricSample {
  const sample: MetricSample = { name, value };
  // Only upper levels are graphed
  if (outcome.upper) {
    sample.warn = outcome.upper[0];
    sample.crit = outcome.upper[1];
  }
  if (boundaries?.[0] !== undefined) sample.min = boundaries[0];
  if (boundaries?.[1] !== undefined) sample.max = boundaries[1];
  return sample;
}

function levelsText(outcome: LevelsOutcome, formatting: Formatting): string {
  if (outcome.state === State.OK || !outcome.violated) return '';
  const levels = outcome.violated === 'upper' ? outcome.upper : outcome.lower;
  if (!levels) return '';
  const [warn, crit] = levels;
  const verb = outcome.violated === 'upper' ? 'at' : 'below';
  return ` (warn/crit ${verb} ${formatting.render(warn)}/${formatting.render(crit)})`;
}

function evaluate(
  value: number,
  policy: ThresholdPolicy,
  formatting: Formatting,
  reference?: number,
): { result: EvaluationResult; outcome: LevelsOutcome } {
  const outcome = evaluateLevels(value, policy, reference);
  const summary = withLabel(formatting.label, formatting.render(value)) + levelsText(outcome, formatting);
  const details = outcome.inverted
    ? `${summary} [inverted levels: warn lies beyond crit]`
    : summary;

  const metrics = formatting.metricName
    ? [metricSample(formatting.metricName, value, outcome, formatting.boundaries)]
    : [];

  return { result: fromSubResults([{ state: outcome.state, summary, details }], metrics), outcome };
}

/**
 * Evaluate a single value. Pure: no state is read or written.
 *
 * @param reference - capacity the percentages of a percentage policy refer to
 */
export function checkLevels(
  value: number,
  policy: ThresholdPolicy,
  formatting: Formatting,
  reference?: number,
): EvaluationResult {
  try {
    return evaluate(value, policy, formatting, reference).result;
  } catch (err) {
    return failure(formatting.label, err);
  }
}

export interface AverageOptions {
  backlogMinutes: number;
  /** Emit the average as its own performance sample */
  averageMetricName?: string;
}

export interface RateOptions {
  /** Capacity for percentage levels on the rate */
  reference?: number;
  /** Smooth the rate before comparing it against the levels */
  average?: AverageOptions;
}

export class Evaluator {
  constructor(
    private readonly rates: RateCalculator,
    private readonly averager: Averager,
  ) {}

  check(value: number, policy: ThresholdPolicy, formatting: Formatting, reference?: number): EvaluationResult {
    return checkLevels(value, policy, formatting, reference);
  }

  /**
   * Evaluate the per-second rate of a counter. The first sample of a counter
   * only initializes it; that is reported as OK with the raw counter reading
   * and without performance data.
   */
  checkRate(
    counterId: string,
    value: number,
    timestamp: number,
    policy: ThresholdPolicy,
    formatting: Formatting,
    options: RateOptions = {},
  ): EvaluationResult {
    try {
      const { rate, isFirstSample } = this.rates.rate(counterId, value, timestamp);
      // No rate yet: report the raw counter, not a value in the rate's unit
      if (isFirstSample) return okResult(withLabel(formatting.label, `counter initialized at ${value}`));
      if (rate === undefined) return okResult(withLabel(formatting.label, `no rate available yet (counter at ${value})`));
      if (options.average) {
        return this.checkAverage(`${counterId}.avg`, rate, timestamp, policy, formatting, options.average, options.reference);
      }
      return checkLevels(rate, policy, formatting, options.reference);
    } catch (err) {
      return failure(formatting.label, err);
    }
  }

  /**
   * Evaluate the moving average of a value instead of the value itself.
   * The raw value keeps its performance sample; levels apply to the average.
   */
  checkAverage(
    counterId: string,
    value: number,
    timestamp: number,
    policy: ThresholdPolicy,
    formatting: Formatting,
    options: AverageOptions,
    reference?: number,
  ): EvaluationResult {
    try {
      const averaged = this.averager.average(counterId, value, timestamp, options.backlogMinutes);
      const label = withLabel(formatting.label, `${formatting.render(value)}, ${options.backlogMinutes} min average`);
      const { result, outcome } = evaluate(averaged, policy, {
        ...formatting,
        label,
        metricName: options.averageMetricName,
      }, reference);

      const metrics = formatting.metricName
        ? [metricSample(formatting.metricName, value, outcome, formatting.boundaries), ...result.metrics]
        : result.metrics;
      return { ...result, metrics };
    } catch (err) {
      return failure(formatting.label, err);
    }
  }
}
