#!/usr/bin/env node
/**
 * Runs one analysis: fetch feeds, filter, score, aggregate and write the site.
 */

import { AnalysisPipeline } from './services/analysis-pipeline';
import { loadConfig } from './services/config-loader';
import { ConsoleObserver } from './services/pipeline-observer';
import { SiteGenerator } from './services/site-generator';

export async function main(): Promise<void> {
  const config = loadConfig();
  const observer = new ConsoleObserver();

  console.log(
    `Analyzing ${config.feeds.length} feeds over the last ${config.monthsBack} months (${config.relevance.policy} relevance)`
  );

  const pipeline = AnalysisPipeline.fromConfig(config, { observer });
  const result = await pipeline.run();

  const site = new SiteGenerator(config.outputDir).generate(result);
  console.log(`Total relevant articles: ${result.totalArticles}`);
  console.log(`Site generated in ${config.outputDir} (${site.sourcePages.length} source pages)`);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
