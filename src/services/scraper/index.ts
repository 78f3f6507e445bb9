/**
 * Listing scraper: adapter-based orchestrator.
 *
 * `scrapeListingPage` handles a single page and lets fetch failures reach the
 * caller; `scrapeListings` walks every page and collects failures instead.
 */

import * as cheerio from 'cheerio';
import type { ListingAdapter, ListingPage, ScrapeOptions, ScrapeResult, StrainInfo, FetchOptions } from './types';
import { fetchPage } from './http-client';
import { getAdapterForUrl } from './adapter-registry';

export type { StrainInfo, AnalyzedStrain, ListingPage, ScrapeResult, ScrapeOptions, ListingAdapter } from './types';
export { fetchPage, delay } from './http-client';
export { getAdapterForUrl, getAdapterByType, registerAdapter } from './adapter-registry';
export { parseStrainInfo } from './utils/strain';

const DEFAULT_PAGES = 2;

/** Fetch one listing page, count its product cards and extract its strains */
export async function scrapeListingPage(
  pageUrl: string,
  adapter: ListingAdapter,
  options: FetchOptions = {}
): Promise<ListingPage> {
  const html = await fetchPage(pageUrl, options);
  return extractListingPage(html, adapter);
}

/** Parse already-fetched HTML. Malformed or empty markup yields no listings */
export function extractListingPage(html: string, adapter: ListingAdapter): ListingPage {
  return adapter.extractPage(cheerio.load(html));
}

/**
 * Scrape pages 1..pages of a listing template without calling the model.
 * A failed page is recorded in `errors` and skipped.
 */
export async function scrapeListings(template: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
  const adapter = options.adapter ?? getAdapterForUrl(template).adapter;
  const pages = options.pages ?? DEFAULT_PAGES;
  const strains: StrainInfo[] = [];
  const errors: string[] = [];
  let pagesScraped = 0;

  for (let page = 1; page <= pages; page++) {
    const pageUrl = adapter.getPageUrl(template, page);
    try {
      const listingPage = await scrapeListingPage(pageUrl, adapter, options);
      pagesScraped++;
      console.log(
        `[Scraper] ${adapter.name} page ${page}: ${listingPage.strains.length} strains in ${listingPage.listings} listings`
      );
      strains.push(...listingPage.strains);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      errors.push(`Page ${page} failed: ${msg}`);
      console.log(`[Scraper] ${adapter.name} page ${page} failed: ${msg}`);
    }
  }

  return { strains, pagesScraped, errors };
}
