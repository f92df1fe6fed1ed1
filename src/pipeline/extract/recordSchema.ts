import { z } from 'zod';
import { FIELD_KEYS, type ExtractedRecord } from '../../types.js';
import { parseQty } from '../../utils/qty.js';
import { collectLineItems, type LineItemDraft } from './common.js';

const scalar = z.union([z.string(), z.number()]).transform((value) => String(value).trim());
const field = scalar.nullish().catch(undefined);

const itemSchema = z.object({
  name: z.string(),
  quantity: z.union([z.number(), z.string()]).nullish(),
  unit_price: scalar.nullish(),
  total_price: scalar.nullish(),
});

export const recordSchema = z.object({
  vendor_name: field,
  amount_due: field,
  date_due: field,
  order_number: field,
  order_date: field,
  total_amount: field,
  shipping_address: field,
  tracking_number: field,
  email_from: field,
  items: z.array(z.unknown()).nullish().catch(undefined),
});

function itemToDraft(raw: unknown): LineItemDraft | null {
  const parsed = itemSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { name, quantity, unit_price, total_price } = parsed.data;
  return {
    name,
    quantity: typeof quantity === 'string' ? parseQty(quantity) : quantity,
    unitPrice: unit_price,
    totalPrice: total_price,
  };
}

/**
 * Reads a record from loosely shaped JSON. Returns null when the payload is not an
 * object; fields of the wrong type and invalid items are dropped.
 */
export function toExtractedRecord(payload: unknown): ExtractedRecord | null {
  const parsed = recordSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const record: ExtractedRecord = {};
  for (const key of FIELD_KEYS) {
    const value = parsed.data[key];
    if (value) {
      record[key] = value;
    }
  }

  const drafts = (parsed.data.items ?? [])
    .map(itemToDraft)
    .filter((draft): draft is LineItemDraft => draft !== null);
  const items = collectLineItems(drafts);
  if (items.length) {
    record.items = items;
  }

  return record;
}
