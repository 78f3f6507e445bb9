/**
 * Quick scraper smoke-test. Lists parsed strains without calling the model.
 *
 * Usage:
 *   npm run test:scraper
 *   npm run test:scraper -- "https://livwell.com/order_ahead/pre-weighed-flower?page={page}" 1
 */

import { loadConfig } from '../config';
import { scrapeListings, getAdapterForUrl } from '../services/scraper';

const [, , urlArg, pagesArg] = process.argv;

const config = loadConfig();
const template = urlArg ?? config.listingUrl;
const pages = pagesArg ? parseInt(pagesArg, 10) : config.listingPages;

if (!Number.isInteger(pages) || pages < 1) {
  console.error('Usage: ts-node test-scraper.ts [url-template] [pages]');
  process.exit(1);
}

const { adapter, adapterType } = getAdapterForUrl(template);
console.log(`\nScraping ${pages} page(s) of ${template} with ${adapter.name} (${adapterType})\n`);

scrapeListings(template, {
  adapter,
  pages,
  timeoutMs: config.pageTimeoutMs,
  maxAttempts: config.scrapeMaxAttempts,
})
  .then((result) => {
    console.log(`Pages:   ${result.pagesScraped}/${pages}`);
    console.log(`Strains: ${result.strains.length}\n`);
    result.strains.forEach((s, i) => {
      console.log(`  [${i + 1}] ${s.strainName}`);
      console.log(`       THC: ${s.thcPercentage}`);
    });
    for (const err of result.errors) console.log(`  ! ${err}`);
    process.exit(0);
  })
  .catch((err: unknown) => {
    console.error('Scrape failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
