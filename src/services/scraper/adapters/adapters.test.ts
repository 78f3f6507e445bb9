import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { LivWellAdapter } from './livwell';
import { GenericAdapter } from './generic';

const LIVWELL_PAGE = `
<html><body>
  <div class="product-card">
    <div class="product-card-content">
      <h3>Blue Dream 3.5g</h3>
      <div class="product-batch"><span> Blue Dream THC: 24.5% </span><span>ignored</span></div>
    </div>
  </div>
  <div class="product-card-content">
    <div class="product-batch"><span>Gelato</span></div>
  </div>
  <div class="product-card-content">
    <div class="product-batch"></div>
  </div>
  <div class="product-card-content"><p>no batch here</p></div>
  <div class="product-card-content">
    <div class="product-batch"><span>   </span></div>
  </div>
  <div class="product-card-content">
    <div class="product-batch"><span>Blue Dream THC: 19%</span></div>
  </div>
</body></html>`;

describe('LivWellAdapter', () => {
  const adapter = new LivWellAdapter();

  it('collects the first batch span of each card', () => {
    expect(adapter.extractStrainTexts(cheerio.load(LIVWELL_PAGE))).toEqual([
      'Blue Dream THC: 24.5%',
      'Gelato',
      'Blue Dream THC: 19%',
    ]);
  });

  it('parses strains and keeps duplicate names', () => {
    expect(adapter.extractStrains(cheerio.load(LIVWELL_PAGE))).toEqual([
      { strainName: 'Blue Dream', thcPercentage: '24.5%' },
      { strainName: 'Blue Dream', thcPercentage: '19%' },
    ]);
  });

  it('returns nothing for empty or malformed markup', () => {
    expect(adapter.extractStrains(cheerio.load(''))).toEqual([]);
    expect(adapter.extractStrains(cheerio.load('<div class="product-card-content"><div class="product-batch"><span>Runtz THC: 2'))).toEqual([
      { strainName: 'Runtz', thcPercentage: '2' },
    ]);
  });

  it('counts every product card, parseable or not', () => {
    expect(adapter.countListings(cheerio.load(LIVWELL_PAGE))).toBe(6);
    expect(adapter.extractPage(cheerio.load(LIVWELL_PAGE)).listings).toBe(6);
    expect(adapter.countListings(cheerio.load('<p>Closed today</p>'))).toBe(0);
  });

  it('builds page URLs from the template', () => {
    expect(adapter.getPageUrl('https://livwell.com/order_ahead/pre-weighed-flower?page={page}', 2)).toBe(
      'https://livwell.com/order_ahead/pre-weighed-flower?page=2'
    );
  });
});

describe('GenericAdapter', () => {
  const adapter = new GenericAdapter();

  it('takes the innermost THC label of each product card', () => {
    const $ = cheerio.load(`
      <ul>
        <li class="product-item"><a href="/p/1"><b>Wedding Cake</b></a><p class="meta">Wedding   Cake THC: 27%</p></li>
        <li class="product-item"><p>Pre-roll pack</p></li>
      </ul>
      <div class="product-card"><div class="product-card-body"><span>Runtz THC: 22.1%</span></div></div>`);

    expect(adapter.extractStrains($)).toEqual([
      { strainName: 'Wedding Cake', thcPercentage: '27%' },
      { strainName: 'Runtz', thcPercentage: '22.1%' },
    ]);
  });

  it('counts nested card markup once', () => {
    const $ = cheerio.load(
      '<div class="product-card"><div class="product-card-body"><span>Runtz THC: 22.1%</span></div></div>' +
        '<li class="product-item"><p>Pre-roll pack</p></li>'
    );
    expect(adapter.countListings($)).toBe(2);
  });

  it('ignores THC labels outside product cards', () => {
    const $ = cheerio.load('<p>Average THC: 20%</p>');
    expect(adapter.extractStrains($)).toEqual([]);
  });
});
