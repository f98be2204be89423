/**
 * Feed retrieval types
 */

import { FeedConfig } from './analysis-config';

/**
 * One entry as produced by a feed, before normalization
 */
export interface RawFeedEntry {
  title: string;
  link: string;
  description: string;
  /** Raw published (or updated) timestamp; absent when the feed gives none */
  published?: string;
}

/**
 * Retrieves the entries of one feed. Implementations resolve to an empty
 * list when the feed cannot be retrieved or parsed.
 */
export interface FeedFetcher {
  fetchEntries(feed: FeedConfig): Promise<RawFeedEntry[]>;
}
