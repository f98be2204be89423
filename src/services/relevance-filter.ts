/**
 * Relevance Filter
 *
 * Decides whether an article's combined title and description is on-topic.
 * Two named policies are supported and exactly one is active:
 * - KEYWORD_SET: any configured term occurs as a raw substring
 * - DUAL_TERM: the text contains "china" or "xi"
 *
 * Matching is case-insensitive substring search; no other normalization is
 * applied, so "xi" also matches inside "existing".
 */

import { Article } from '../types/article';
import { RelevanceConfig, RelevancePolicyName } from '../types/analysis-config';
import { ConfigurationError } from '../types/validation';
import { articleText } from './article';

export interface RelevancePolicy {
  readonly name: RelevancePolicyName;
  /** @param lowerText - text already lower-cased */
  matches(lowerText: string): boolean;
}

export class KeywordSetPolicy implements RelevancePolicy {
  readonly name = 'KEYWORD_SET' as const;
  private readonly keywords: string[];

  constructor(keywords: string[]) {
    const blank = keywords.findIndex((keyword) => keyword.length === 0);
    if (blank !== -1) {
      throw new ConfigurationError([
        {
          field: `relevance.keywords[${blank}]`,
          message: 'Keywords cannot be empty',
          code: 'INVALID_VALUE'
        }
      ]);
    }
    this.keywords = keywords.map((keyword) => keyword.toLowerCase());
  }

  matches(lowerText: string): boolean {
    return this.keywords.some((keyword) => lowerText.includes(keyword));
  }
}

export class DualTermPolicy implements RelevancePolicy {
  static readonly TERMS = ['china', 'xi'] as const;
  readonly name = 'DUAL_TERM' as const;

  matches(lowerText: string): boolean {
    return DualTermPolicy.TERMS.some((term) => lowerText.includes(term));
  }
}

export function createRelevancePolicy(config: RelevanceConfig): RelevancePolicy {
  switch (config.policy) {
    case 'KEYWORD_SET':
      return new KeywordSetPolicy(config.keywords);
    case 'DUAL_TERM':
      return new DualTermPolicy();
  }
}

export class RelevanceFilter {
  constructor(private readonly policy: RelevancePolicy) {}

  /**
   * Name of the active policy
   */
  getPolicy(): RelevancePolicyName {
    return this.policy.name;
  }

  containsReference(text: string): boolean {
    return this.policy.matches(text.toLowerCase());
  }

  /**
   * Keep the articles whose title and description match, in their original order
   */
  filterRelevant(articles: Article[]): Article[] {
    return articles.filter((article) => this.containsReference(articleText(article)));
  }
}
