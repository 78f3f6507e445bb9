import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

/** Collapse whitespace runs and trim an element's text */
export function cleanText<T extends AnyNode>(element: Cheerio<T>): string {
  return element.text().replace(/\s+/g, ' ').trim();
}
