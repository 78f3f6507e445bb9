import type { CheerioAPI } from 'cheerio';
import type { AxiosInstance } from 'axios';

// ── Scraping output types ────────────────────────────────────────────────────

export interface StrainInfo {
  strainName: string;
  thcPercentage: string;
}

export interface AnalyzedStrain extends StrainInfo {
  analysis: string;
}

/** What one listing page held: product cards seen, and the strains parsed from them */
export interface ListingPage {
  listings: number;
  strains: StrainInfo[];
}

export interface ScrapeResult {
  strains: StrainInfo[];
  pagesScraped: number;
  errors: string[];
}

// ── Scraping options ─────────────────────────────────────────────────────────

export interface FetchOptions {
  /** Axios instance to send the request through (defaults to the global axios) */
  client?: AxiosInstance;
  timeoutMs?: number;
  /** Total attempts per page; 1 disables retries */
  maxAttempts?: number;
  retryBaseMs?: number;
}

export interface ScrapeOptions extends FetchOptions {
  pages?: number;
  /** Force a specific adapter instead of resolving one from the URL */
  adapter?: ListingAdapter;
}

// ── Adapter interface ────────────────────────────────────────────────────────

export interface ListingAdapter {
  /** Human-readable name, e.g. "LivWell" */
  name: string;
  /** Build the listing URL for a given page number */
  getPageUrl(template: string, page: number): string;
  /** Number of product cards on a loaded listing page, parseable or not */
  countListings($: CheerioAPI): number;
  /** Raw "NAME THC: NN%" texts found on a loaded listing page */
  extractStrainTexts($: CheerioAPI): string[];
  /** Parsed strain records found on a loaded listing page */
  extractStrains($: CheerioAPI): StrainInfo[];
  /** Card count and parsed strains in one pass */
  extractPage($: CheerioAPI): ListingPage;
}
