/**
 * Base class for errors raised by the reaction core.
 * Classification never raises; balancing and input validation do.
 */
export abstract class ChemistryError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid input: coefficients, formulas, equation strings, serialized payloads
 */
export class ValidationError extends ChemistryError {
  public readonly field: string;
  public readonly reason: string;

  constructor(field: string, reason: string, value?: unknown) {
    super(`Validation failed for '${field}': ${reason}`, 'VALIDATION_ERROR', { field, reason, value });
    this.field = field;
    this.reason = reason;
  }
}

/**
 * The equation cannot conserve atoms with positive coefficients
 */
export class BalancingError extends ChemistryError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Unable to balance reaction: ${reason}`, 'BALANCING_ERROR', details);
  }
}

export interface ConfigIssue {
  path: (string | number)[];
  message: string;
}

export class ConfigValidationError extends ChemistryError {
  public readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    const message = issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`${source} validation failed with the following issues:\n${message}`, 'CONFIG_VALIDATION_ERROR', {
      source,
    });
    this.issues = issues;
  }
}
