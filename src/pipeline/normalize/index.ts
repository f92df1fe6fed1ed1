import { load } from 'cheerio';
import { collapseWhitespace } from '../../utils/text.js';

/**
 * Flattens HTML markup to a single line of text. Every element boundary becomes a
 * word boundary, so `<td>Qty</td><td>3</td>` reads as `Qty 3` rather than `Qty3`.
 */
export function normalizeHtml(html: string): string {
  const $ = load(html);
  $('script, style, noscript, template').remove();
  $('*').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });
  return collapseWhitespace($.root().text());
}
