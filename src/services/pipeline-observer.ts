/**
 * Pipeline Observer
 *
 * Diagnostics hooks the pipeline calls at fixed points. The core never owns
 * a logger; callers inject one of these.
 */

import { SourceSummary } from '../types/source-statistics';

export interface PipelineObserver {
  onFeedFetched(source: string, entryCount: number): void;
  onFeedError(source: string, error: unknown): void;
  onTimeWindowApplied(source: string, kept: number, total: number, cutoff: Date): void;
  onRelevanceFiltered(source: string, kept: number, total: number): void;
  onScoringComplete(source: string, scored: number): void;
  onAggregationComplete(summaries: SourceSummary[]): void;
}

/**
 * Default no-op observer
 */
export const noopObserver: PipelineObserver = {
  onFeedFetched(): void {},
  onFeedError(): void {},
  onTimeWindowApplied(): void {},
  onRelevanceFiltered(): void {},
  onScoringComplete(): void {},
  onAggregationComplete(): void {}
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Observer that reports every pipeline step on the console
 */
export class ConsoleObserver implements PipelineObserver {
  constructor(private readonly prefix: string = '[pipeline]') {}

  onFeedFetched(source: string, entryCount: number): void {
    console.log(`${this.prefix} Fetched ${entryCount} entries from ${source}`);
  }

  onFeedError(source: string, error: unknown): void {
    console.error(`${this.prefix} Error fetching feed from ${source}: ${describeError(error)}`);
  }

  onTimeWindowApplied(source: string, kept: number, total: number, cutoff: Date): void {
    console.log(
      `${this.prefix} Found ${kept} recent articles from ${source} (${total} entries, cutoff ${cutoff.toISOString()})`
    );
  }

  onRelevanceFiltered(source: string, kept: number, total: number): void {
    console.log(`${this.prefix} Filtered ${kept} relevant articles from ${total} total (${source})`);
  }

  onScoringComplete(source: string, scored: number): void {
    console.log(`${this.prefix} Scored ${scored} articles from ${source}`);
  }

  onAggregationComplete(summaries: SourceSummary[]): void {
    const covered = summaries.filter((s) => s.status === 'OK').length;
    console.log(`${this.prefix} Aggregated ${summaries.length} sources (${covered} with coverage)`);
  }
}
