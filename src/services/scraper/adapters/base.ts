import type { CheerioAPI } from 'cheerio';
import type { ListingAdapter, ListingPage, StrainInfo } from '../types';
import { parseStrainInfo } from '../utils/strain';
import { formatPageUrl } from '../utils/url';

/**
 * Base class providing shared helpers for all listing adapters.
 * Subclasses must implement: name, countListings, extractStrainTexts.
 */
export abstract class AbstractAdapter implements ListingAdapter {
  abstract name: string;
  abstract countListings($: CheerioAPI): number;
  abstract extractStrainTexts($: CheerioAPI): string[];

  getPageUrl(template: string, page: number): string {
    return formatPageUrl(template, page);
  }

  /** Parse every batch label on the page, dropping the ones without a THC figure */
  extractStrains($: CheerioAPI): StrainInfo[] {
    const strains: StrainInfo[] = [];
    for (const text of this.extractStrainTexts($)) {
      const info = this.parseStrainInfo(text);
      if (info) strains.push(info);
    }
    return strains;
  }

  extractPage($: CheerioAPI): ListingPage {
    return { listings: this.countListings($), strains: this.extractStrains($) };
  }

  // Re-export utilities for adapter convenience
  protected parseStrainInfo = parseStrainInfo;
}
