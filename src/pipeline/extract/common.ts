import type { LineItem } from '../../types.js';
import { normalizeQty } from '../../utils/qty.js';
import { collapseWhitespace } from '../../utils/text.js';

export interface LineItemDraft {
  name: string | null | undefined;
  quantity?: number | null;
  unitPrice?: string | null;
  totalPrice?: string | null;
}

export function toLineItem(draft: LineItemDraft): LineItem | null {
  const name = collapseWhitespace(draft.name ?? '');
  if (!name) {
    return null;
  }

  const item: LineItem = { name, quantity: normalizeQty(draft.quantity) };
  if (draft.unitPrice) {
    item.unit_price = draft.unitPrice;
  }
  if (draft.totalPrice) {
    item.total_price = draft.totalPrice;
  }
  return item;
}

export function collectLineItems(drafts: Iterable<LineItemDraft>): LineItem[] {
  const out: LineItem[] = [];
  for (const draft of drafts) {
    const item = toLineItem(draft);
    if (item) {
      out.push(item);
    }
  }
  return out;
}
