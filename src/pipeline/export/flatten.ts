import { FIELD_KEYS, type ExtractedRecord, type LineItem } from '../../types.js';

export type FlatValue = string | number;
export type FlatRecord = Record<string, FlatValue>;

const ITEM_KEYS: ReadonlyArray<keyof LineItem> = ['name', 'quantity', 'unit_price', 'total_price'];

export function flattenRecord(record: ExtractedRecord): FlatRecord {
  const flat: FlatRecord = {};
  for (const key of FIELD_KEYS) {
    const value = record[key];
    if (value !== undefined) {
      flat[key] = value;
    }
  }

  (record.items ?? []).forEach((item, index) => {
    for (const key of ITEM_KEYS) {
      const value = item[key];
      if (value !== undefined) {
        flat[`item${index + 1}_${key}`] = value;
      }
    }
  });

  return flat;
}

/** Union of all keys, in the order each first appears. */
export function collectColumns(rows: FlatRecord[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return [...columns];
}
