/**
 * Article construction and serialization
 *
 * Builds normalized Article entities from raw feed entries. Construction
 * never fails: an unusable published instant is replaced by the fallback.
 */

import { Article, ArticleInput, ArticleRecord, ScoredArticle } from '../types/article';
import { formatUtcDate, normalizeInstant } from '../utils/time';

/**
 * Create an Article with its published instant normalized to UTC
 */
export function createArticle(input: ArticleInput): Article {
  const normalized = input.published !== undefined ? normalizeInstant(input.published) : undefined;

  return {
    title: input.title,
    link: input.link,
    publishedAt: normalized ?? new Date(input.fallback.getTime()),
    description: input.description ?? '',
    source: input.source
  };
}

/**
 * The text relevance and sentiment are evaluated on
 */
export function articleText(article: Pick<Article, 'title' | 'description'>): string {
  return `${article.title} ${article.description}`;
}

export function isScored(article: Article): article is ScoredArticle {
  return article.sentimentScore !== undefined && article.sentimentLabel !== undefined;
}

export function toArticleRecord(article: Article): ArticleRecord {
  return {
    title: article.title,
    link: article.link,
    published: formatUtcDate(article.publishedAt),
    description: article.description,
    source: article.source,
    sentimentScore: article.sentimentScore ?? null,
    sentimentLabel: article.sentimentLabel ?? null
  };
}
