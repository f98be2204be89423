/**
 * Site Generator
 *
 * Writes the results of a run as static pages: an index ranking every
 * source, one page per source listing its articles by score, and a JSON
 * report with the same data.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Article, SentimentLabel } from '../types/article';
import { AggregationReportRecord, SourceStatistics, SourceSummary } from '../types/source-statistics';
import { toArticleRecord } from './article';
import { PipelineResult } from './analysis-pipeline';
import { SourceAggregator } from './source-aggregator';

export interface GeneratedSite {
  indexPath: string;
  reportPath: string;
  sourcePages: string[];
}

const LABEL_TEXT: Record<SentimentLabel, string> = {
  very_negative: 'Very negative',
  negative: 'Negative',
  neutral: 'Neutral',
  positive: 'Positive',
  very_positive: 'Very positive'
};

const STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; max-width: 1100px; margin: 0 auto; padding: 20px; background: #f5f5f5; color: #333; }
  h1 { border-bottom: 3px solid #007bff; padding-bottom: 10px; }
  .card { background: #fff; padding: 16px 20px; margin: 14px 0; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
  .score { font-weight: bold; }
  .very_positive, .positive { color: #1e7e34; }
  .neutral { color: #6c757d; }
  .negative, .very_negative { color: #c82333; }
  .muted { color: #6c757d; }
  .sentiment-bar { position: relative; height: 24px; margin: 10px 0; border-radius: 4px; background: linear-gradient(to right, #dc3545 0%, #ffc107 50%, #28a745 100%); }
  .sentiment-marker { position: absolute; top: 0; width: 3px; height: 100%; background: #000; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * File name of a source's detail page. Anything other than letters, digits,
 * `_` and `-` becomes `_`, so the page always lands in the output directory.
 */
export function sourceFilename(sourceName: string): string {
  return `${sourceName.toLowerCase().replace(/[^a-z0-9_-]+/g, '_')}.html`;
}

/**
 * Horizontal position of an average score on the sentiment bar, in percent
 */
export function markerPosition(averageScore: number): number {
  return Math.round(((averageScore + 1) / 2) * 100);
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>${STYLE}</style>
</head>
<body>
${body}
</body>
</html>
`;
}

function formatScore(score: number): string {
  return score.toFixed(3);
}

function renderSourceCard(summary: SourceSummary): string {
  const name = escapeHtml(summary.sourceName);
  if (summary.status === 'NO_DATA') {
    return `<div class="card"><h2>${name}</h2><p class="muted">No relevant coverage this period.</p></div>`;
  }

  const { statistics } = summary;
  const histogram = SourceAggregator.histogramEntries(statistics.labelHistogram)
    .map(([label, count]) => `<li class="${label}">${LABEL_TEXT[label]}: ${count}</li>`)
    .join('');

  return `<div class="card">
<h2><a href="${escapeHtml(sourceFilename(summary.sourceName))}">${name}</a></h2>
<p>Articles: ${statistics.articleCount} &middot; Average: <span class="score">${formatScore(statistics.averageScore)}</span> &middot; Range: ${formatScore(statistics.minScore)} to ${formatScore(statistics.maxScore)}</p>
<div class="sentiment-bar"><div class="sentiment-marker" style="left: ${markerPosition(statistics.averageScore)}%;"></div></div>
<ul>${histogram}</ul>
</div>`;
}

export function renderIndexPage(result: PipelineResult): string {
  const cards = result.summaries.map(renderSourceCard).join('\n');
  return page(
    'News Sentiment Analysis',
    `<h1>News Sentiment Analysis</h1>
<div class="card">
<p>Relevant articles: ${result.totalArticles}</p>
<p class="muted">Published since ${result.cutoff.toISOString().slice(0, 10)} &middot; generated ${result.generatedAt.toISOString()}</p>
</div>
${cards}`
  );
}

function renderArticle(article: Article): string {
  const record = toArticleRecord(article);
  const labelClass = record.sentimentLabel ?? 'neutral';
  const labelText = record.sentimentLabel ? LABEL_TEXT[record.sentimentLabel] : 'Unscored';
  const score = record.sentimentScore === null ? '' : ` (${formatScore(record.sentimentScore)})`;

  return `<div class="card">
<h3><a href="${escapeHtml(record.link)}">${escapeHtml(record.title)}</a></h3>
<p class="muted">${record.published}</p>
<p>${escapeHtml(record.description)}</p>
<p class="score ${labelClass}">${labelText}${score}</p>
</div>`;
}

/**
 * @param articles - already ranked by score
 */
export function renderSourcePage(statistics: SourceStatistics, articles: Article[]): string {
  const { sourceName } = statistics;

  return page(
    `${sourceName} - News Sentiment`,
    `<p><a href="index.html">&larr; All sources</a></p>
<h1>${escapeHtml(sourceName)}</h1>
<div class="card"><p>Articles: ${statistics.articleCount} &middot; Average: <span class="score">${formatScore(statistics.averageScore)}</span></p></div>
${articles.map(renderArticle).join('\n')}`
  );
}

export function toReportRecord(result: PipelineResult): AggregationReportRecord {
  return {
    generatedAt: result.generatedAt.toISOString(),
    totalArticles: result.totalArticles,
    sources: result.summaries.map((summary) => ({
      ...summary,
      articles: (result.articlesBySource.get(summary.sourceName) ?? []).map(toArticleRecord)
    }))
  };
}

export class SiteGenerator {
  constructor(private readonly outputDir: string) {}

  generate(result: PipelineResult): GeneratedSite {
    fs.mkdirSync(this.outputDir, { recursive: true });

    const indexPath = path.join(this.outputDir, 'index.html');
    fs.writeFileSync(indexPath, renderIndexPage(result), 'utf-8');

    const sourcePages: string[] = [];
    for (const summary of result.summaries) {
      if (summary.status === 'NO_DATA') {
        continue;
      }
      const articles = result.articlesBySource.get(summary.sourceName) ?? [];
      const pagePath = path.join(this.outputDir, sourceFilename(summary.sourceName));
      fs.writeFileSync(pagePath, renderSourcePage(summary.statistics, articles), 'utf-8');
      sourcePages.push(pagePath);
    }

    const reportPath = path.join(this.outputDir, 'report.json');
    fs.writeFileSync(reportPath, JSON.stringify(toReportRecord(result), null, 2), 'utf-8');

    return { indexPath, reportPath, sourcePages };
  }
}
