import type { AnalyzedStrain, FetchOptions, ListingAdapter, ListingPage, StrainInfo } from './scraper/types';
import { scrapeListingPage, getAdapterForUrl, delay } from './scraper';
import { getStrainAnalysis, type TextGenerator } from './analyzer';

/** Per-run counters, owned by the caller */
export interface RunStats {
  pagesScraped: number;
  pagesFailed: number;
  pagesEmpty: number;
  strainsAnalyzed: number;
  strainsFailed: number;
}

export function createRunStats(): RunStats {
  return { pagesScraped: 0, pagesFailed: 0, pagesEmpty: 0, strainsAnalyzed: 0, strainsFailed: 0 };
}

export interface PipelineOptions {
  model: TextGenerator;
  pages?: number;
  /** Pause after each model call */
  requestDelayMs?: number;
  adapter?: ListingAdapter;
  fetch?: FetchOptions;
  /** Override how a single strain gets analyzed (defaults to the model prompt) */
  analyze?: (info: StrainInfo) => Promise<string>;
  /** Filled in as the run progresses */
  stats?: RunStats;
}

const RULE = '='.repeat(50);
const DIVIDER = '-'.repeat(30);

/**
 * Scrape each listing page and ask the model about every strain found on it.
 * Page failures skip the page; strain failures skip the strain.
 */
export async function analyzeListings(template: string, options: PipelineOptions): Promise<AnalyzedStrain[]> {
  const adapter = options.adapter ?? getAdapterForUrl(template).adapter;
  const pages = options.pages ?? 2;
  const requestDelayMs = options.requestDelayMs ?? 1000;
  const analyze = options.analyze ?? ((info: StrainInfo) => getStrainAnalysis(options.model, info));
  const stats = options.stats ?? createRunStats();

  console.log('Starting strain analysis...');
  console.log(RULE);

  const allStrains: AnalyzedStrain[] = [];

  for (let page = 1; page <= pages; page++) {
    let listingPage: ListingPage;
    try {
      listingPage = await scrapeListingPage(adapter.getPageUrl(template, page), adapter, options.fetch);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.log(`Error on page ${page}: ${msg}`);
      stats.pagesFailed++;
      continue;
    }

    stats.pagesScraped++;
    // Cards without a parseable THC line are skipped quietly
    if (listingPage.listings === 0) {
      console.log(`No products found on page ${page}`);
      stats.pagesEmpty++;
      continue;
    }

    for (const info of listingPage.strains) {
      try {
        console.log(`\nAnalyzing: ${info.strainName} (${info.thcPercentage})`);

        const analysis = await analyze(info);
        allStrains.push({ ...info, analysis });
        stats.strainsAnalyzed++;

        console.log(DIVIDER);
        console.log(analysis);
        console.log(DIVIDER);

        await delay(requestDelayMs);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.log(`Error processing strain: ${msg}`);
        stats.strainsFailed++;
      }
    }
  }

  return allStrains;
}
