/**
 * Source Aggregator Service
 *
 * Computes per-source sentiment statistics and the two orderings renderers
 * rely on:
 * - sources by average score, descending (ties keep insertion order,
 *   sources without coverage last)
 * - articles within a source by score, descending (ties keep original order)
 */

import { Article, SENTIMENT_LABELS, SentimentLabel } from '../types/article';
import {
  AggregationReport,
  LabelHistogram,
  SourceStatistics,
  SourceSummary
} from '../types/source-statistics';
import { isScored } from './article';
import { roundScore } from './lexical-sentiment-scorer';

export const SourceAggregator = {
  /**
   * Summarize one source. Only scored articles contribute; a source without
   * any is reported as NO_DATA.
   */
  summarize(sourceName: string, articles: Article[]): SourceSummary {
    const scored = articles.filter(isScored);
    if (scored.length === 0) {
      return { status: 'NO_DATA', sourceName };
    }

    let sum = 0;
    let minScore = Infinity;
    let maxScore = -Infinity;
    const labelHistogram: LabelHistogram = {};

    for (const article of scored) {
      sum += article.sentimentScore;
      minScore = Math.min(minScore, article.sentimentScore);
      maxScore = Math.max(maxScore, article.sentimentScore);
      labelHistogram[article.sentimentLabel] = (labelHistogram[article.sentimentLabel] ?? 0) + 1;
    }

    const statistics: SourceStatistics = {
      sourceName,
      articleCount: scored.length,
      averageScore: roundScore(sum / scored.length),
      minScore: roundScore(minScore),
      maxScore: roundScore(maxScore),
      labelHistogram
    };

    return { status: 'OK', sourceName, statistics };
  },

  /**
   * Order summaries by average score, descending. Array.prototype.sort is
   * stable, so equal averages keep their insertion order.
   */
  rankSources(summaries: SourceSummary[]): SourceSummary[] {
    const withData = summaries.filter(
      (s): s is Extract<SourceSummary, { status: 'OK' }> => s.status === 'OK'
    );
    const withoutData = summaries.filter((s) => s.status === 'NO_DATA');

    const ranked = [...withData].sort(
      (a, b) => b.statistics.averageScore - a.statistics.averageScore
    );
    return [...ranked, ...withoutData];
  },

  /**
   * Order articles by score, descending. Unscored articles rank as 0 and are
   * left untouched.
   */
  rankArticles<T extends Article>(articles: T[]): T[] {
    return [...articles].sort((a, b) => (b.sentimentScore ?? 0) - (a.sentimentScore ?? 0));
  },

  /**
   * Summarize and rank every source of a run
   */
  aggregate(articlesBySource: Map<string, Article[]>): AggregationReport {
    const summaries: SourceSummary[] = [];
    const rankedArticles = new Map<string, Article[]>();
    let totalArticles = 0;

    for (const [sourceName, articles] of articlesBySource) {
      summaries.push(this.summarize(sourceName, articles));
      rankedArticles.set(sourceName, this.rankArticles(articles));
      totalArticles += articles.length;
    }

    return {
      summaries: this.rankSources(summaries),
      articlesBySource: rankedArticles,
      totalArticles
    };
  },

  /**
   * Sum of a histogram's counts
   */
  histogramTotal(histogram: LabelHistogram): number {
    return Object.values(histogram).reduce<number>((sum, count) => sum + (count ?? 0), 0);
  },

  /**
   * Histogram counts in label order, lowest first, zero counts omitted
   */
  histogramEntries(histogram: LabelHistogram): Array<[SentimentLabel, number]> {
    const entries: Array<[SentimentLabel, number]> = [];
    for (const label of SENTIMENT_LABELS) {
      const count = histogram[label];
      if (count !== undefined && count > 0) {
        entries.push([label, count]);
      }
    }
    return entries;
  }
};
