/**
 * Article Data Types for News Sentiment Analysis
 */

export type SentimentLabel =
  | 'very_negative'
  | 'negative'
  | 'neutral'
  | 'positive'
  | 'very_positive';

/**
 * Labels ordered from lowest to highest sentiment
 */
export const SENTIMENT_LABELS: readonly SentimentLabel[] = [
  'very_negative',
  'negative',
  'neutral',
  'positive',
  'very_positive'
];

/**
 * A published instant as handed over by a feed. A Date is an absolute moment;
 * a string without a zone designator is read as a UTC wall clock.
 */
export type PublishedInstant = Date | string;

export interface Article {
  title: string;
  link: string;
  /** Always a UTC instant */
  publishedAt: Date;
  description: string;
  source: string;
  sentimentScore?: number;
  sentimentLabel?: SentimentLabel;
}

/**
 * Input for constructing an Article from a raw feed entry
 */
export interface ArticleInput {
  title: string;
  link: string;
  description?: string;
  source: string;
  published?: PublishedInstant;
  /** Used when `published` is missing or unparseable */
  fallback: Date;
}

/**
 * Serializable shape handed to renderers
 */
export interface ArticleRecord {
  title: string;
  link: string;
  published: string;
  description: string;
  source: string;
  sentimentScore: number | null;
  sentimentLabel: SentimentLabel | null;
}

export interface ScoredArticle extends Article {
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
}
