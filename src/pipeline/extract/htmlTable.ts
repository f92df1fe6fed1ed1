import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ColumnRole, LineItem, TableColumnMap } from '../../types.js';
import { parsePrice } from '../../utils/money.js';
import { parseQty } from '../../utils/qty.js';
import { collapseWhitespace } from '../../utils/text.js';
import { collectLineItems, type LineItemDraft } from './common.js';

const ITEM_TABLE_INDICATORS = ['item', 'product', 'description', 'quantity', 'price', 'amount', 'subtotal'];
const MIN_ITEM_TABLE_SCORE = 3;

const ROLE_HEADERS: ReadonlyArray<[ColumnRole, string[]]> = [
  ['name', ['item', 'product', 'description']],
  ['quantity', ['qty', 'quantity']],
  ['price', ['price', 'unit', 'cost']],
  ['total', ['total', 'amount', 'subtotal']],
];

export function scoreItemTable(tableText: string): number {
  const text = tableText.toLowerCase();
  return ITEM_TABLE_INDICATORS.filter((indicator) => text.includes(indicator)).length;
}

export function resolveColumnRole(header: string): ColumnRole | undefined {
  const text = header.trim().toLowerCase();
  return ROLE_HEADERS.find(([, keywords]) => keywords.some((keyword) => text.includes(keyword)))?.[0];
}

/** First header wins each role; later headers resolving to a taken role are ignored. */
export function buildColumnMap(headers: string[]): TableColumnMap {
  const columns = new Map<ColumnRole, number>();
  headers.forEach((header, index) => {
    const role = resolveColumnRole(header);
    if (role && !columns.has(role)) {
      columns.set(role, index);
    }
  });
  return columns;
}

function cellTexts($: CheerioAPI, row: Element): string[] {
  return $(row)
    .find('th,td')
    .toArray()
    .map((cell) => collapseWhitespace($(cell).text()));
}

function rowToDraft(cells: string[], columns: TableColumnMap): LineItemDraft {
  const at = (role: ColumnRole): string | undefined => {
    const index = columns.get(role);
    return index === undefined ? undefined : cells[index];
  };

  const qtyCell = at('quantity');
  const priceCell = at('price');
  const totalCell = at('total');

  return {
    name: at('name'),
    quantity: qtyCell === undefined ? null : parseQty(qtyCell),
    unitPrice: priceCell === undefined ? null : parsePrice(priceCell),
    totalPrice: totalCell === undefined ? null : parsePrice(totalCell),
  };
}

function readItemTable($: CheerioAPI, table: Element): LineItem[] {
  const rows = $(table).find('tr').toArray();
  if (rows.length < 2) {
    return [];
  }

  const columns = buildColumnMap(cellTexts($, rows[0]));
  if (!columns.has('name')) {
    return [];
  }

  const required = Math.max(...columns.values()) + 1;
  const drafts = rows
    .slice(1)
    .map((row) => cellTexts($, row))
    .filter((cells) => cells.length >= required)
    .map((cells) => rowToDraft(cells, columns));

  return collectLineItems(drafts);
}

/**
 * Reads line items from the first table in document order that looks like an order
 * table. Later tables are never consulted, even when the chosen one yields nothing.
 */
export function extractTableItems(html: string): LineItem[] {
  const $ = load(html);
  const table = $('table')
    .toArray()
    .find((candidate) => scoreItemTable($(candidate).text()) >= MIN_ITEM_TABLE_SCORE);

  return table ? readItemTable($, table) : [];
}
