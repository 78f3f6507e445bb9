import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { AbstractAdapter } from './base';
import { cleanText } from '../utils/html';

const CARD_SELECTORS = [
  '[class*="product-card"]', '[class*="product-item"]', '[class*="product-tile"]',
  '[data-product-id]', 'article[class*="product"]', 'li[class*="product"]',
];

/**
 * Fallback adapter for menus without a dedicated adapter.
 * Takes the innermost element of each product card whose text mentions "THC:".
 */
export class GenericAdapter extends AbstractAdapter {
  name = 'Generic';

  /** Outermost product cards; nested matches (product-card > product-card-content) count once */
  private findCards($: CheerioAPI): Element[] {
    const cards = new Set<Element>();
    $<Element, string>(CARD_SELECTORS.join(', ')).each((_, el) => {
      if ($(el).parents().toArray().some((parent) => cards.has(parent))) return;
      cards.add(el);
    });
    return [...cards];
  }

  countListings($: CheerioAPI): number {
    return this.findCards($).length;
  }

  extractStrainTexts($: CheerioAPI): string[] {
    const texts: string[] = [];

    for (const el of this.findCards($)) {
      const label = $(el)
        .find('*')
        .filter((_, node) => {
          const $node = $(node);
          if (!$node.text().includes('THC:')) return false;
          return $node.children().filter((_, child) => $(child).text().includes('THC:')).length === 0;
        })
        .first();
      if (!label.length) continue;

      const text = cleanText(label);
      if (text) texts.push(text);
    }

    return texts;
  }
}
