/**
 * RSS Feed Adapter - retrieves and parses RSS/Atom feeds into raw entries
 *
 * Retrieval or parse failures are reported to the observer and resolve to an
 * empty entry list for that source; the adapter never retries.
 */

import Parser from 'rss-parser';
import { FeedConfig } from '../../types/analysis-config';
import { FeedFetcher, RawFeedEntry } from '../../types/feed';
import { noopObserver, PipelineObserver } from '../../services/pipeline-observer';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../../services/config-loader';

/**
 * Item fields the adapter reads; `description` and `updated` are requested as
 * custom fields so their raw values are kept
 */
export interface RssItem {
  title?: string;
  link?: string;
  description?: string;
  summary?: string;
  contentSnippet?: string;
  pubDate?: string;
  updated?: string;
  isoDate?: string;
}

/**
 * The part of rss-parser the adapter depends on
 */
export interface FeedParser {
  parseURL(url: string): Promise<{ items: RssItem[] }>;
}

export interface RssFeedAdapterConfig {
  timeoutMs?: number;
  userAgent?: string;
  observer?: PipelineObserver;
  parser?: FeedParser;
}

const DEFAULT_USER_AGENT = 'news-sentiment-monitor/1.0';

export function createFeedParser(timeoutMs: number, userAgent: string): FeedParser {
  return new Parser<Record<string, unknown>, { description?: string; updated?: string }>({
    timeout: timeoutMs,
    headers: { 'User-Agent': userAgent },
    customFields: { item: ['description', 'updated'] }
  });
}

/**
 * Map a parsed item to a raw entry. Plain-text snippets are preferred over
 * raw description markup; the published date falls back to the updated date.
 */
export function toRawFeedEntry(item: RssItem): RawFeedEntry {
  const published = item.pubDate || item.updated || item.isoDate;

  return {
    title: item.title?.trim() ?? '',
    link: item.link?.trim() ?? '',
    description: (item.contentSnippet || item.description || item.summary || '').trim(),
    ...(published ? { published } : {})
  };
}

export class RssFeedAdapter implements FeedFetcher {
  private readonly parser: FeedParser;
  private readonly observer: PipelineObserver;

  constructor(config: RssFeedAdapterConfig = {}) {
    this.parser =
      config.parser ??
      createFeedParser(config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS, config.userAgent ?? DEFAULT_USER_AGENT);
    this.observer = config.observer ?? noopObserver;
  }

  async fetchEntries(feed: FeedConfig): Promise<RawFeedEntry[]> {
    try {
      const parsed = await this.parser.parseURL(feed.url);
      const entries = parsed.items.map(toRawFeedEntry);
      this.observer.onFeedFetched(feed.name, entries.length);
      return entries;
    } catch (error) {
      this.observer.onFeedError(feed.name, error);
      return [];
    }
  }
}
