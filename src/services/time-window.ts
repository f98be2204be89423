/**
 * Time Window Filter
 *
 * Keeps articles published within a trailing window of calendar months
 * ending at the moment the filter is created.
 */

import { Article } from '../types/article';
import { ConfigurationError } from '../types/validation';
import { subtractMonthsUtc } from '../utils/time';

export class TimeWindowFilter {
  private readonly cutoff: Date;

  constructor(
    readonly monthsBack: number,
    now: Date = new Date()
  ) {
    if (!Number.isInteger(monthsBack) || monthsBack < 1) {
      throw new ConfigurationError([
        {
          field: 'monthsBack',
          message: `Must be a positive integer, got ${monthsBack}`,
          code: 'INVALID_VALUE'
        }
      ]);
    }
    this.cutoff = subtractMonthsUtc(now, monthsBack);
  }

  getCutoff(): Date {
    return new Date(this.cutoff.getTime());
  }

  isRecent(article: Article): boolean {
    return article.publishedAt.getTime() >= this.cutoff.getTime();
  }

  filterRecent(articles: Article[]): Article[] {
    return articles.filter((article) => this.isRecent(article));
  }
}
