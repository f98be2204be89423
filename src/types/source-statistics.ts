/**
 * Per-source aggregation types
 */

import { Article, ArticleRecord, SentimentLabel } from './article';

export type LabelHistogram = Partial<Record<SentimentLabel, number>>;

export interface SourceStatistics {
  sourceName: string;
  articleCount: number;
  averageScore: number;
  minScore: number;
  maxScore: number;
  labelHistogram: LabelHistogram;
}

export type SourceSummary =
  | { status: 'OK'; sourceName: string; statistics: SourceStatistics }
  | { status: 'NO_DATA'; sourceName: string };

export interface AggregationReport {
  /** Ranked by average score, NO_DATA sources last */
  summaries: SourceSummary[];
  /** Each source's articles ranked by score */
  articlesBySource: Map<string, Article[]>;
  totalArticles: number;
}

/**
 * JSON form of an AggregationReport
 */
export interface AggregationReportRecord {
  generatedAt: string;
  totalArticles: number;
  sources: Array<SourceSummary & { articles: ArticleRecord[] }>;
}
