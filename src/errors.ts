/**
 * Errors that abort a run. Everything else (malformed markets or observations,
 * contracts without a match, undefined rates) is reported in the results.
 */

/**
 * Configuration is invalid; raised once, before any scan or analysis runs
 */
export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * A required input of a run is absent; the run cannot proceed
 */
export class MissingInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingInputError';
  }
}
