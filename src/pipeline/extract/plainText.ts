import type { LineItem } from '../../types.js';
import { parsePrice } from '../../utils/money.js';
import { takeBlock } from '../../utils/text.js';
import { collectLineItems, type LineItemDraft } from './common.js';

interface ItemGrammar {
  pattern: RegExp;
  read: (match: RegExpMatchArray) => LineItemDraft;
}

const ITEM_GRAMMARS: ItemGrammar[] = [
  // 2 x Blue Shirt, $15.00
  {
    pattern: /(\d+)\s*x\s*([^,\n]+)[\s,]*(?:\$|EUR|£)?([0-9,.]+)/g,
    read: (m) => ({ quantity: Number.parseInt(m[1], 10), name: m[2], unitPrice: m[3] }),
  },
  // 2 Blue Shirt @ $15.00
  {
    pattern: /(\d+)\s+([^@\n]{1,200})@\s*(?:\$|EUR|£)?([0-9,.]+)/g,
    read: (m) => ({ quantity: Number.parseInt(m[1], 10), name: m[2], unitPrice: m[3] }),
  },
  // Blue Shirt (2) $15.00
  {
    pattern: /([^()\n]{1,200})\s*\((\d+)\)\s*(?:\$|EUR|£)?([0-9,.]+)/g,
    read: (m) => ({ name: m[1], quantity: Number.parseInt(m[2], 10), unitPrice: m[3] }),
  },
];

const ITEM_SECTION_HEADING = /(?:Your Order|Order Details|Items|Products)/i;
const NAME_BEFORE_PRICE = /^(.*?)(?=\$|EUR|€|£|[0-9]{1,3},[0-9]{3}|[0-9]+\.[0-9]+)/;
const LIST_MARKER = /^[-*•]\s*/;
const LEADING_QTY = /^(\d+)\s*x\b\s*/;
const MIN_ITEM_LINE_LENGTH = 10;

function grammarDrafts(text: string): LineItemDraft[] {
  return ITEM_GRAMMARS.flatMap((grammar) => Array.from(text.matchAll(grammar.pattern), grammar.read));
}

export function findItemSection(text: string): string | null {
  const heading = ITEM_SECTION_HEADING.exec(text);
  if (!heading) {
    return null;
  }
  const headingEnd = heading.index + heading[0].length;
  return text.slice(heading.index, headingEnd) + takeBlock(text, headingEnd);
}

export function lineToDraft(line: string): LineItemDraft | null {
  if (line.trim().length <= MIN_ITEM_LINE_LENGTH) {
    return null;
  }

  const split = NAME_BEFORE_PRICE.exec(line);
  if (!split) {
    return null;
  }

  let name = split[1].trim().replace(LIST_MARKER, '');
  let quantity = 1;
  const qty = LEADING_QTY.exec(name);
  if (qty) {
    quantity = Number.parseInt(qty[1], 10);
    name = name.slice(qty[0].length).trim();
  }

  return { name, quantity, unitPrice: parsePrice(line.slice(split[1].length)) };
}

function sectionDrafts(text: string): LineItemDraft[] {
  const section = findItemSection(text);
  if (!section) {
    return [];
  }
  return section
    .split('\n')
    .map(lineToDraft)
    .filter((draft): draft is LineItemDraft => draft !== null);
}

/**
 * Every grammar runs over the whole text and all of their matches are kept, so a line
 * fitting two grammars yields two items. The section scan only runs when no grammar
 * matched at all.
 */
export function extractTextItems(text: string): LineItem[] {
  const fromGrammars = collectLineItems(grammarDrafts(text));
  if (fromGrammars.length) {
    return fromGrammars;
  }
  return collectLineItems(sectionDrafts(text));
}
