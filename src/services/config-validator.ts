/**
 * Analysis Configuration Validator
 *
 * Validates a parsed configuration against the JSON schema, then applies the
 * semantic rules the schema cannot express: threshold bands strictly
 * descending, disjoint polarity lexicons and unique source names.
 */

import Ajv, { ErrorObject } from 'ajv';
import { AnalysisConfigSchema } from '../schemas/analysis-config';
import { AnalysisConfig } from '../types/analysis-config';
import { ValidationError, ValidationResult } from '../types/validation';
import { validateLexicon, validateThresholdTable } from './lexical-sentiment-scorer';

export interface ConfigValidationResult extends ValidationResult {
  config?: AnalysisConfig;
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateSchema = ajv.compile<AnalysisConfig>(AnalysisConfigSchema);

/**
 * Converts AJV errors to our ValidationError format
 */
function convertErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return [];

  return errors.map((error) => ({
    field: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
    code: `SCHEMA_${error.keyword.toUpperCase()}`
  }));
}

function validateFeeds(config: AnalysisConfig): ValidationError[] {
  const errors: ValidationError[] = [];
  const seen = new Set<string>();

  config.feeds.forEach((feed, index) => {
    if (seen.has(feed.name)) {
      errors.push({
        field: `feeds[${index}].name`,
        message: `Duplicate source name: ${feed.name}`,
        code: 'DUPLICATE_SOURCE'
      });
    }
    seen.add(feed.name);
  });

  return errors;
}

/**
 * Validates an analysis configuration
 */
export function validateAnalysisConfig(candidate: unknown): ConfigValidationResult {
  if (!validateSchema(candidate)) {
    return { valid: false, errors: convertErrors(validateSchema.errors) };
  }

  const errors = [
    ...validateFeeds(candidate),
    ...validateLexicon(candidate.lexicon.positive, candidate.lexicon.negative, candidate.divisor),
    ...validateThresholdTable(candidate.thresholds)
  ];

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors: [], config: candidate };
}

/**
 * Gets error messages as a formatted string
 */
export function formatErrors(result: ValidationResult): string {
  if (result.valid) {
    return '';
  }
  return result.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
}
