/**
 * Errors raised by the engine.
 *
 * Only misconfiguration is an error. Rejected insertions, hit-test misses
 * and out-of-range indices are reported as no-ops, nulls or clamps.
 */

export class ConfigurationError extends Error {
  /** The option that failed validation, when one can be named. */
  readonly option: string | null;

  constructor(message: string, option: string | null = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.option = option;
  }
}
