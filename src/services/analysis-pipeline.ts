/**
 * Analysis Pipeline
 *
 * Runs every configured source through
 * article construction → time window → relevance filter → sentiment scoring,
 * then aggregates and ranks the sources.
 *
 * Feeds are fetched concurrently. Each source is processed on its own and the
 * final ranking is established once all sources are done, so the output does
 * not depend on the order in which feeds respond.
 */

import { Article } from '../types/article';
import { AnalysisConfig, FeedConfig, RelevancePolicyName } from '../types/analysis-config';
import { FeedFetcher, RawFeedEntry } from '../types/feed';
import { AggregationReport } from '../types/source-statistics';
import { RssFeedAdapter } from '../adapters/news/rss-feed-adapter';
import { createArticle } from './article';
import { LexicalSentimentScorer } from './lexical-sentiment-scorer';
import { noopObserver, PipelineObserver } from './pipeline-observer';
import { createRelevancePolicy, RelevanceFilter } from './relevance-filter';
import { SourceAggregator } from './source-aggregator';
import { TextProcessor } from './text-processor';
import { TimeWindowFilter } from './time-window';

export interface AnalysisPipelineDeps {
  fetcher: FeedFetcher;
  relevanceFilter: RelevanceFilter;
  scorer: LexicalSentimentScorer;
  observer?: PipelineObserver;
  /** Clock for the trailing window and missing timestamps */
  now?: () => Date;
}

export interface PipelineOptions {
  fetcher?: FeedFetcher;
  observer?: PipelineObserver;
  textProcessor?: TextProcessor;
  now?: () => Date;
}

export interface PipelineResult extends AggregationReport {
  generatedAt: Date;
  cutoff: Date;
  relevancePolicy: RelevancePolicyName;
}

export class AnalysisPipeline {
  private readonly observer: PipelineObserver;
  private readonly now: () => Date;

  constructor(
    private readonly feeds: FeedConfig[],
    private readonly monthsBack: number,
    private readonly deps: AnalysisPipelineDeps
  ) {
    this.observer = deps.observer ?? noopObserver;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Build a pipeline from a validated configuration
   *
   * @throws ConfigurationError when the relevance policy or scorer settings are invalid
   */
  static fromConfig(config: AnalysisConfig, options: PipelineOptions = {}): AnalysisPipeline {
    const observer = options.observer ?? noopObserver;
    const scorer = new LexicalSentimentScorer(
      {
        positiveTerms: config.lexicon.positive,
        negativeTerms: config.lexicon.negative,
        divisor: config.divisor,
        thresholds: config.thresholds
      },
      options.textProcessor
    );

    return new AnalysisPipeline(config.feeds, config.monthsBack, {
      fetcher: options.fetcher ?? new RssFeedAdapter({ timeoutMs: config.requestTimeoutMs, observer }),
      relevanceFilter: new RelevanceFilter(createRelevancePolicy(config.relevance)),
      scorer,
      observer,
      now: options.now
    });
  }

  /**
   * Normalize raw entries into articles; entries without a usable timestamp
   * are stamped with `fallback`
   */
  buildArticles(source: string, entries: RawFeedEntry[], fallback: Date): Article[] {
    return entries.map((entry) =>
      createArticle({
        title: entry.title,
        link: entry.link,
        description: entry.description,
        source,
        published: entry.published,
        fallback
      })
    );
  }

  /**
   * Run one source's entries through the window, relevance and scoring steps
   */
  processSource(source: string, entries: RawFeedEntry[], window: TimeWindowFilter, fallback: Date): Article[] {
    const articles = this.buildArticles(source, entries, fallback);

    const recent = window.filterRecent(articles);
    this.observer.onTimeWindowApplied(source, recent.length, articles.length, window.getCutoff());

    const relevant = this.deps.relevanceFilter.filterRelevant(recent);
    this.observer.onRelevanceFiltered(source, relevant.length, recent.length);

    this.deps.scorer.analyzeBatch(relevant);
    this.observer.onScoringComplete(source, relevant.length);

    return relevant;
  }

  private async fetchSafely(feed: FeedConfig): Promise<RawFeedEntry[]> {
    try {
      return await this.deps.fetcher.fetchEntries(feed);
    } catch (error) {
      this.observer.onFeedError(feed.name, error);
      return [];
    }
  }

  async run(): Promise<PipelineResult> {
    const generatedAt = this.now();
    const window = new TimeWindowFilter(this.monthsBack, generatedAt);

    const fetched = await Promise.all(this.feeds.map((feed) => this.fetchSafely(feed)));

    const articlesBySource = new Map<string, Article[]>();
    this.feeds.forEach((feed, index) => {
      articlesBySource.set(feed.name, this.processSource(feed.name, fetched[index], window, generatedAt));
    });

    const report = SourceAggregator.aggregate(articlesBySource);
    this.observer.onAggregationComplete(report.summaries);

    return {
      ...report,
      generatedAt,
      cutoff: window.getCutoff(),
      relevancePolicy: this.deps.relevanceFilter.getPolicy()
    };
  }
}
