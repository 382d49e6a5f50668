/** Lifecycle misuse, e.g. starting a bus that is already running. */
export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

/**
 * Conditions no bus may intercept. A listener throwing one of these aborts
 * the rest of the dispatch and the error reaches whoever drives it.
 */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

export class InterruptError extends FatalError {
  constructor(message = 'Interrupted') {
    super(message);
    this.name = 'InterruptError';
  }
}

// V8 reports a failed buffer allocation as a plain RangeError
const ALLOCATION_FAILURE = /allocation failed/i;

export function isFatalError(error: unknown): boolean {
  if (error instanceof FatalError) return true;
  return error instanceof RangeError && ALLOCATION_FAILURE.test(error.message);
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (Number.isInteger(value)) return 'integer';
    if (!Number.isFinite(value)) return 'non-finite number';
    return 'non-integer number';
  }
  if (typeof value === 'function') return 'function';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
