/**
 * Lexical Sentiment Scorer
 *
 * Scores text by counting known polarity terms among its meaningful tokens
 * (stop-words and punctuation removed):
 *
 *   score = clamp(tally / max(n * divisor, 1), -1, 1)
 *
 * where tally is +1 per positive token and -1 per negative token, and n is
 * the number of meaningful tokens. Text without meaningful tokens scores 0.
 * Scores are mapped to labels through a five-band threshold table applied
 * top-down.
 */

import { Article, SentimentLabel } from '../types/article';
import { ThresholdTable } from '../types/analysis-config';
import { ConfigurationError, ValidationError } from '../types/validation';
import { articleText } from './article';
import { SimpleTextProcessor, TextProcessor } from './text-processor';

export interface LexicalScorerConfig {
  positiveTerms: Iterable<string>;
  negativeTerms: Iterable<string>;
  /** Roughly 10 polarity tokens per 100 meaningful tokens saturate at 0.1 */
  divisor?: number;
  thresholds?: ThresholdTable;
}

export const DEFAULT_DIVISOR = 0.1;

export const DEFAULT_THRESHOLDS: ThresholdTable = [
  { label: 'very_positive', lowerBound: 0.5 },
  { label: 'positive', lowerBound: 0.1 },
  { label: 'neutral', lowerBound: -0.1 },
  { label: 'negative', lowerBound: -0.5 },
  { label: 'very_negative', lowerBound: null }
];

/**
 * Label order a threshold table must follow, highest band first
 */
export const THRESHOLD_LABEL_ORDER: readonly SentimentLabel[] = [
  'very_positive',
  'positive',
  'neutral',
  'negative',
  'very_negative'
];

export const SCORE_DECIMAL_PLACES = 3;

const PUNCTUATION_ONLY = /^[^\p{L}\p{N}]+$/u;

/**
 * Round half away from zero to a fixed number of decimal places
 */
export function roundScore(value: number, places: number = SCORE_DECIMAL_PLACES): number {
  const factor = 10 ** places;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  // Avoid -0 for tiny negative values
  return rounded === 0 ? 0 : rounded;
}

/**
 * Check that a threshold table has exactly five bands in label order with
 * strictly descending lower bounds, the last one unbounded
 */
export function validateThresholdTable(table: ThresholdTable): ValidationError[] {
  const errors: ValidationError[] = [];

  if (table.length !== THRESHOLD_LABEL_ORDER.length) {
    errors.push({
      field: 'thresholds',
      message: `Threshold table must have exactly ${THRESHOLD_LABEL_ORDER.length} entries, got ${table.length}`,
      code: 'INVALID_LENGTH'
    });
    return errors;
  }

  table.forEach((entry, index) => {
    const expected = THRESHOLD_LABEL_ORDER[index];
    if (entry.label !== expected) {
      errors.push({
        field: `thresholds[${index}].label`,
        message: `Expected ${expected}, got ${entry.label}`,
        code: 'INVALID_ORDER'
      });
    }

    const isLowest = index === table.length - 1;
    if (isLowest) {
      if (entry.lowerBound !== null) {
        errors.push({
          field: `thresholds[${index}].lowerBound`,
          message: 'The lowest band has no lower bound and must be null',
          code: 'INVALID_VALUE'
        });
      }
      return;
    }

    if (entry.lowerBound === null || !Number.isFinite(entry.lowerBound)) {
      errors.push({
        field: `thresholds[${index}].lowerBound`,
        message: 'Lower bound must be a finite number',
        code: 'INVALID_VALUE'
      });
      return;
    }

    const previous = index > 0 ? table[index - 1].lowerBound : null;
    if (previous !== null && entry.lowerBound >= previous) {
      errors.push({
        field: `thresholds[${index}].lowerBound`,
        message: `Bounds must be strictly descending (${entry.lowerBound} >= ${previous})`,
        code: 'NOT_DESCENDING'
      });
    }
  });

  return errors;
}

/**
 * Check the lexicon and normalization divisor
 */
export function validateLexicon(
  positiveTerms: Iterable<string>,
  negativeTerms: Iterable<string>,
  divisor: number
): ValidationError[] {
  const errors: ValidationError[] = [];
  const positive = new Set(Array.from(positiveTerms, (term) => term.toLowerCase()));
  const overlap = Array.from(negativeTerms, (term) => term.toLowerCase()).filter((term) => positive.has(term));

  if (overlap.length > 0) {
    errors.push({
      field: 'lexicon',
      message: `Positive and negative terms must be disjoint: ${Array.from(new Set(overlap)).join(', ')}`,
      code: 'OVERLAPPING_TERMS'
    });
  }

  if (!Number.isFinite(divisor) || divisor <= 0) {
    errors.push({
      field: 'divisor',
      message: `Divisor must be a positive number, got ${divisor}`,
      code: 'INVALID_VALUE'
    });
  }

  return errors;
}

export class LexicalSentimentScorer {
  private readonly positiveTerms: Set<string>;
  private readonly negativeTerms: Set<string>;
  private readonly divisor: number;
  private readonly thresholds: ThresholdTable;

  /**
   * @throws ConfigurationError when the lexicon, divisor or threshold table is invalid
   */
  constructor(
    config: LexicalScorerConfig,
    private readonly textProcessor: TextProcessor = new SimpleTextProcessor()
  ) {
    const positive = Array.from(config.positiveTerms);
    const negative = Array.from(config.negativeTerms);
    this.divisor = config.divisor ?? DEFAULT_DIVISOR;
    this.thresholds = (config.thresholds ?? DEFAULT_THRESHOLDS).map((entry) => ({ ...entry }));

    const errors = [
      ...validateLexicon(positive, negative, this.divisor),
      ...validateThresholdTable(this.thresholds)
    ];
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.positiveTerms = new Set(positive.map((term) => term.toLowerCase()));
    this.negativeTerms = new Set(negative.map((term) => term.toLowerCase()));
  }

  /**
   * Score text on the closed interval [-1, 1]
   */
  score(text: string): number {
    const tokens = this.textProcessor
      .tokenize(text)
      .filter((token) => !PUNCTUATION_ONLY.test(token) && !this.textProcessor.isStopWord(token));

    if (tokens.length === 0) {
      return 0;
    }

    let tally = 0;
    for (const token of tokens) {
      const lower = token.toLowerCase();
      if (this.positiveTerms.has(lower)) {
        tally += 1;
      } else if (this.negativeTerms.has(lower)) {
        tally -= 1;
      }
    }

    const raw = tally / Math.max(tokens.length * this.divisor, 1);
    return Math.max(-1, Math.min(1, raw));
  }

  label(score: number): SentimentLabel {
    for (const band of this.thresholds) {
      if (band.lowerBound === null || score >= band.lowerBound) {
        return band.label;
      }
    }
    return 'very_negative';
  }

  /**
   * Score every article in place (score rounded to three decimals, half away
   * from zero, and labelled from the rounded value)
   *
   * @returns the same array, for chaining
   */
  analyzeBatch<T extends Article>(articles: T[]): T[] {
    for (const article of articles) {
      const score = roundScore(this.score(articleText(article)));
      article.sentimentScore = score;
      article.sentimentLabel = this.label(score);
    }
    return articles;
  }
}
