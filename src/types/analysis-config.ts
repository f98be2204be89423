/**
 * Configuration Types for the analysis pipeline
 */

import { SentimentLabel } from './article';

export type RelevancePolicyName = 'KEYWORD_SET' | 'DUAL_TERM';

export type RelevanceConfig =
  | { policy: 'KEYWORD_SET'; keywords: string[] }
  | { policy: 'DUAL_TERM' };

export interface ThresholdEntry {
  label: SentimentLabel;
  /** Inclusive lower bound; null for the lowest band */
  lowerBound: number | null;
}

/**
 * Five entries ordered very_positive → very_negative with strictly
 * descending bounds
 */
export type ThresholdTable = ThresholdEntry[];

export interface LexiconConfig {
  positive: string[];
  negative: string[];
}

export interface FeedConfig {
  name: string;
  url: string;
}

export interface AnalysisConfig {
  feeds: FeedConfig[];
  monthsBack: number;
  outputDir: string;
  requestTimeoutMs: number;
  relevance: RelevanceConfig;
  lexicon: LexiconConfig;
  divisor: number;
  thresholds: ThresholdTable;
}
