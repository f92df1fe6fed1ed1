import type { ExtractedFields, ExtractedRecord, LineItem, RawEmailBody } from '../../types.js';
import { toUnixNewlines } from '../../utils/text.js';
import { normalizeHtml } from '../normalize/index.js';
import { extractFields } from './fields.js';
import { extractTableItems } from './htmlTable.js';
import { extractTextItems } from './plainText.js';

function withItems(fields: ExtractedFields, items: LineItem[]): ExtractedRecord {
  return items.length ? { ...fields, items } : { ...fields };
}

export function parseText(text: string): ExtractedRecord {
  const working = toUnixNewlines(text);
  return withItems(extractFields(working), extractTextItems(working));
}

export function parseHtml(html: string): ExtractedRecord {
  const text = normalizeHtml(html);
  const fields = extractFields(text, html);
  const tableItems = extractTableItems(html);
  return withItems(fields, tableItems.length ? tableItems : extractTextItems(text));
}

export function parse(body: RawEmailBody): ExtractedRecord {
  return body.kind === 'html' ? parseHtml(body.html) : parseText(body.text);
}
