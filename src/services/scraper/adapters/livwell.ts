import type { CheerioAPI } from 'cheerio';
import { AbstractAdapter } from './base';

const CARD = 'div.product-card-content';

/**
 * LivWell order-ahead menus. Each product card carries a batch line like
 * `<div class="product-batch"><span>Blue Dream THC: 24.5%</span></div>`.
 */
export class LivWellAdapter extends AbstractAdapter {
  name = 'LivWell';

  countListings($: CheerioAPI): number {
    return $(CARD).length;
  }

  extractStrainTexts($: CheerioAPI): string[] {
    const texts: string[] = [];

    $(CARD).each((_, el) => {
      const batch = $(el).find('div.product-batch').first();
      if (!batch.length) return;

      const span = batch.find('span').first();
      if (!span.length) return;

      const text = span.text().trim();
      if (!text) return;

      texts.push(text);
    });

    return texts;
  }
}
