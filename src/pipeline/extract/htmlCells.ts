import { load } from 'cheerio';

const CELL_AMOUNT = /[$€£]?([0-9,.]+)/;

/**
 * Finds the first `th`/`td` whose own text matches `label` and reads the amount from
 * the next `td` in the same row.
 */
export function findAdjacentCellAmount(html: string, label: RegExp): string | undefined {
  const $ = load(html);

  for (const cell of $('th, td').toArray()) {
    const ownText = $(cell).clone().children().remove().end().text();
    if (!label.test(ownText)) {
      continue;
    }

    const next = $(cell).nextAll('td').first();
    if (!next.length) {
      continue;
    }

    const amount = CELL_AMOUNT.exec(next.text());
    if (amount) {
      return amount[1].trim();
    }
  }

  return undefined;
}
