/**
 * Validation result types and configuration errors
 */

/**
 * Validation error with details about what failed
 */
export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Error thrown when the analysis configuration cannot be used.
 * Scoring and filtering refuse to start while this is raised.
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: ValidationError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigurationError';
  }
}
