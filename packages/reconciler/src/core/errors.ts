/**
 * Make-Ready Error Types
 *
 * Custom error classes for batch-level and pole-level failures. Extraction
 * problems inside a pole are not errors: the offending value is treated as
 * absent and logged.
 */

/**
 * A single schema problem found while validating an input dataset
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Error thrown when an input dataset is not a usable document
 *
 * Raised before any pole is processed; the whole batch is rejected.
 *
 * RECOVERY:
 * - Check that the survey export contains a `nodes` map
 * - Check that the engineering export contains a `leads` array
 */
export class InputValidationError extends Error {
  /**
   * @param dataset - Which input failed validation
   * @param issues - Every schema issue found
   */
  constructor(
    public readonly dataset: 'survey' | 'engineering',
    public readonly issues: readonly ValidationIssue[]
  ) {
    super(`Invalid ${dataset} dataset: ${issues[0]?.message ?? 'malformed document'}`);
    this.name = 'InputValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputValidationError);
    }
  }

  /**
   * Get formatted summary of validation failures
   */
  getSummary(): string {
    const lines = [`The ${this.dataset} dataset failed validation (${this.issues.length} issues):`];
    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - ${issue.path || '<root>'}: ${issue.message}`);
    }
    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more issues`);
    }
    return lines.join('\n');
  }
}

/**
 * Error raised while building the report record for one pole
 */
export class PoleProcessingError extends Error {
  constructor(
    public readonly nodeId: string,
    public readonly poleNumber: string | undefined,
    public readonly reason: unknown
  ) {
    super(
      `Failed to process pole ${poleNumber ?? '<unnumbered>'} (node ${nodeId}): ${
        reason instanceof Error ? reason.message : String(reason)
      }`
    );
    this.name = 'PoleProcessingError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PoleProcessingError);
    }
  }
}

/**
 * Error thrown under the `abort` failure policy when any pole fails
 */
export class BatchAbortedError extends Error {
  constructor(
    public readonly failure: PoleProcessingError,
    public readonly completedPoles: number
  ) {
    super(`Batch aborted after ${completedPoles} poles: ${failure.message}`);
    this.name = 'BatchAbortedError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BatchAbortedError);
    }
  }
}

/**
 * Error thrown when a utility profile cannot be loaded or is malformed
 */
export class ProfileError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'ProfileError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProfileError);
    }
  }
}

/**
 * Error thrown when a configuration file is malformed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}
