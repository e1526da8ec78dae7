/**
 * Errors raised inside the evaluation core. The evaluator turns every one of
 * them into an UNKNOWN result; none of them is meant to reach the process.
 */

export class CheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Operator configuration that cannot be evaluated (bad levels, missing reference). */
export class ConfigurationError extends CheckError {}

/** Input data the parser handed over that is not a usable number. */
export class DataError extends CheckError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a table cell into a finite number.
 * Empty cells and non-numeric text raise a DataError rather than becoming 0.
 */
export function parseNumber(raw: string | undefined, field: string): number {
  if (raw === undefined || raw.trim() === '') {
    throw new DataError(`Missing value for ${field}`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new DataError(`Invalid value for ${field}: '${raw}'`);
  }
  return value;
}

/** Like parseNumber, but an empty or missing cell yields undefined. */
export function parseOptionalNumber(raw: string | undefined, field: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return parseNumber(raw, field);
}

export function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new DataError(`Value of ${field} is not a finite number: ${value}`);
  }
}
