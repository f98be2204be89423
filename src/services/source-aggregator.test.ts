/**
 * Source Aggregator tests
 *
 * For any non-empty source: minScore <= averageScore <= maxScore and the
 * label histogram sums to the article count. Empty sources are kept as
 * NO_DATA. Rankings are stable.
 */

import * as fc from 'fast-check';
import { SourceAggregator } from './source-aggregator';
import { Article, SentimentLabel } from '../types/article';
import { SourceSummary } from '../types/source-statistics';
import { scoredArticleArb } from '../test/generators';

function scored(title: string, sentimentScore: number, sentimentLabel: SentimentLabel): Article {
  return {
    title,
    link: `https://example.com/${encodeURIComponent(title)}`,
    publishedAt: new Date('2024-05-01T00:00:00Z'),
    description: '',
    source: 'Test',
    sentimentScore,
    sentimentLabel
  };
}

function averageOf(summary: SourceSummary): number | undefined {
  return summary.status === 'OK' ? summary.statistics.averageScore : undefined;
}

describe('SourceAggregator', () => {
  describe('summarize', () => {
    it('computes statistics for a source', () => {
      const summary = SourceAggregator.summarize('Outlet', [
        scored('a', 0.8, 'very_positive'),
        scored('b', 0.2, 'positive'),
        scored('c', -0.9, 'very_negative')
      ]);

      expect(summary).toEqual({
        status: 'OK',
        sourceName: 'Outlet',
        statistics: {
          sourceName: 'Outlet',
          articleCount: 3,
          averageScore: 0.033,
          minScore: -0.9,
          maxScore: 0.8,
          labelHistogram: { very_positive: 1, positive: 1, very_negative: 1 }
        }
      });
    });

    it('only lists labels that occur', () => {
      const summary = SourceAggregator.summarize('Outlet', [
        scored('a', 0, 'neutral'),
        scored('b', 0.05, 'neutral')
      ]);

      expect(summary.status === 'OK' && summary.statistics.labelHistogram).toEqual({ neutral: 2 });
    });

    it('marks a source without articles as NO_DATA', () => {
      expect(SourceAggregator.summarize('Quiet', [])).toEqual({ status: 'NO_DATA', sourceName: 'Quiet' });
    });

    it('keeps the average between min and max and the histogram complete', () => {
      fc.assert(
        fc.property(fc.array(scoredArticleArb(), { minLength: 1, maxLength: 30 }), (articles) => {
          const summary = SourceAggregator.summarize('Any', articles);
          expect(summary.status).toBe('OK');
          if (summary.status === 'OK') {
            const { statistics } = summary;
            expect(statistics.minScore).toBeLessThanOrEqual(statistics.averageScore);
            expect(statistics.averageScore).toBeLessThanOrEqual(statistics.maxScore);
            expect(statistics.articleCount).toBe(articles.length);
            expect(SourceAggregator.histogramTotal(statistics.labelHistogram)).toBe(statistics.articleCount);
          }
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('rankSources', () => {
    it('orders by average descending, keeps ties in insertion order and NO_DATA last', () => {
      const summaries: SourceSummary[] = [
        SourceAggregator.summarize('A', [scored('a', 0.2, 'positive')]),
        SourceAggregator.summarize('C', []),
        SourceAggregator.summarize('B', [scored('b', 0.5, 'very_positive')]),
        SourceAggregator.summarize('D', [scored('d', 0.2, 'positive')]),
        SourceAggregator.summarize('E', [])
      ];

      expect(SourceAggregator.rankSources(summaries).map((s) => s.sourceName)).toEqual(['B', 'A', 'D', 'C', 'E']);
    });

    it('always yields non-increasing averages', () => {
      fc.assert(
        fc.property(
          fc.array(fc.array(scoredArticleArb(), { maxLength: 5 }), { maxLength: 8 }),
          (sources) => {
            const summaries = sources.map((articles, i) => SourceAggregator.summarize(`S${i}`, articles));
            const ranked = SourceAggregator.rankSources(summaries);
            const averages = ranked.flatMap((s) => {
              const avg = averageOf(s);
              return avg === undefined ? [] : [avg];
            });

            expect(ranked).toHaveLength(summaries.length);
            for (let i = 1; i < averages.length; i++) {
              expect(averages[i]).toBeLessThanOrEqual(averages[i - 1]);
            }
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('rankArticles', () => {
    it('orders by score descending, treating missing scores as 0 without mutating them', () => {
      const a = scored('a', 0.1, 'neutral');
      const b = scored('b', 0.5, 'very_positive');
      const unscored: Article = {
        title: 'u',
        link: 'https://example.com/u',
        publishedAt: new Date('2024-05-01T00:00:00Z'),
        description: '',
        source: 'Test'
      };
      const d = scored('d', 0.1, 'neutral');
      const e = scored('e', -0.2, 'negative');
      const input = [a, b, unscored, d, e];

      const ranked = SourceAggregator.rankArticles(input);

      expect(ranked).toEqual([b, a, d, unscored, e]);
      expect(ranked[1]).toBe(a);
      expect(ranked[2]).toBe(d);
      expect(unscored.sentimentScore).toBeUndefined();
      expect(input).toEqual([a, b, unscored, d, e]);
    });
  });

  describe('aggregate', () => {
    it('summarizes, ranks and counts every source', () => {
      const articlesBySource = new Map<string, Article[]>([
        ['Low', [scored('l1', -0.4, 'negative'), scored('l2', 0.3, 'positive')]],
        ['Empty', []],
        ['High', [scored('h1', 0.6, 'very_positive')]]
      ]);

      const report = SourceAggregator.aggregate(articlesBySource);

      expect(report.summaries.map((s) => s.sourceName)).toEqual(['High', 'Low', 'Empty']);
      expect(report.summaries.map(averageOf)).toEqual([0.6, -0.05, undefined]);
      expect(report.totalArticles).toBe(3);
      expect(report.articlesBySource.get('Low')?.map((a) => a.title)).toEqual(['l2', 'l1']);
      expect(report.articlesBySource.get('Empty')).toEqual([]);
    });
  });

  describe('histogramEntries', () => {
    it('lists labels from lowest to highest', () => {
      expect(
        SourceAggregator.histogramEntries({ very_positive: 2, negative: 1, neutral: 0 })
      ).toEqual([
        ['negative', 1],
        ['very_positive', 2]
      ]);
    });
  });
});
