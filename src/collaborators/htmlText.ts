import * as cheerio from 'cheerio';

/**
 * Plain text of an HTML fragment: tags dropped, entities decoded, whitespace collapsed
 */
export function htmlToText(fragment: string): string {
  const $ = cheerio.load(fragment, null, false);
  return $.root().text().replace(/\s+/g, ' ').trim();
}
