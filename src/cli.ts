#!/usr/bin/env node
/**
 * Scrape the flower menu, analyze every strain with the local model, save the
 * report, then take recommendation requests.
 *
 * Usage:
 *   npm run dev                          # Scrape, analyze, then chat
 *   npm run dev -- --pages 1             # Only the first listing page
 *   npm run dev -- --no-interactive      # Skip the recommendation prompt
 *   npm run dev -- --model llama3 -v     # Other model, print run summary
 */

import { loadConfig } from './config';
import { parseCliArgs, USAGE } from './cli-args';
import { OllamaClient } from './services/ollama';
import { analyzeListings, createRunStats } from './services/pipeline';
import { saveReport } from './services/report';
import { getStrainRecommendations } from './services/analyzer';
import { runRecommendationLoop } from './services/recommender';

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const listingUrl = options.listingUrl ?? config.listingUrl;
  const outputFile = options.outputFile ?? config.outputFile;

  const model = new OllamaClient({
    baseUrl: config.ollamaUrl,
    model: options.model ?? config.ollamaModel,
    timeoutMs: config.modelTimeoutMs,
  });

  if (options.verbose) {
    console.log(`[Config] Listing: ${listingUrl}`);
    console.log(`[Config] Ollama: ${config.ollamaUrl} (${model.model})`);
  }

  const stats = createRunStats();
  const analyzedStrains = await analyzeListings(listingUrl, {
    model,
    stats,
    pages: options.pages ?? config.listingPages,
    requestDelayMs: config.requestDelayMs,
    fetch: {
      timeoutMs: config.pageTimeoutMs,
      maxAttempts: config.scrapeMaxAttempts,
    },
  });

  console.log('\nAnalysis Complete!');
  console.log(`Total strains analyzed: ${analyzedStrains.length}`);

  const saved = await saveReport(outputFile, analyzedStrains);

  let served = 0;
  if (options.interactive) {
    served = await runRecommendationLoop(analyzedStrains, {
      recommend: (preference, strains) => getStrainRecommendations(model, preference, strains),
    });
  }

  if (options.verbose) {
    console.log('\n=== Summary ===');
    console.log(`Pages scraped:    ${stats.pagesScraped} (${stats.pagesEmpty} empty, ${stats.pagesFailed} failed)`);
    console.log(`Strains analyzed: ${stats.strainsAnalyzed} (${stats.strainsFailed} failed)`);
    console.log(`Report:           ${saved ? outputFile : 'not saved'}`);
    console.log(`Recommendations:  ${served}`);
  }
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
