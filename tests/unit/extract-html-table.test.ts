import { describe, expect, it } from 'vitest';
import { buildColumnMap, extractTableItems, resolveColumnRole } from '../../src/pipeline/extract/htmlTable.js';

describe('resolveColumnRole', () => {
  it('maps headers by substring', () => {
    expect(resolveColumnRole('Item Description')).toBe('name');
    expect(resolveColumnRole('Qty.')).toBe('quantity');
    expect(resolveColumnRole('Unit Cost')).toBe('price');
    expect(resolveColumnRole('Amount')).toBe('total');
    expect(resolveColumnRole('SKU')).toBeUndefined();
  });

  it('gives a header its first matching role', () => {
    expect(resolveColumnRole('Item Total')).toBe('name');
  });
});

describe('buildColumnMap', () => {
  it('keeps the first header for each role', () => {
    const columns = buildColumnMap(['Product', 'Description', 'Quantity', 'Total']);
    expect([...columns.entries()]).toEqual([
      ['name', 0],
      ['quantity', 2],
      ['total', 3],
    ]);
  });
});

describe('extractTableItems', () => {
  it('reads an item table', () => {
    const html = `
      <table>
        <caption>Product summary</caption>
        <tr><th>Item</th><th>Qty</th><th>Price</th></tr>
        <tr><td>Widget</td><td>3</td><td>$9.99</td></tr>
      </table>
    `;

    expect(extractTableItems(html)).toEqual([{ name: 'Widget', quantity: 3, unit_price: '9.99' }]);
  });

  it('keeps decimal-comma prices whole', () => {
    const html = `
      <table>
        <tr><th>Item</th><th>Quantity</th><th>Price</th></tr>
        <tr><td>Kettle</td><td>1</td><td>€1.234,56</td></tr>
      </table>
    `;

    expect(extractTableItems(html)).toEqual([{ name: 'Kettle', quantity: 1, unit_price: '1.234,56' }]);
  });

  it('ignores tables that do not look like item tables', () => {
    const html = `
      <table>
        <tr><td>Item</td><td>Price</td></tr>
        <tr><td>Notebook</td><td>$4.00</td></tr>
      </table>
    `;

    expect(extractTableItems(html)).toEqual([]);
  });

  it('skips short rows and rows without a name', () => {
    const html = `
      <table>
        <tr><th>Item</th><th>Quantity</th><th>Price</th><th>Total</th></tr>
        <tr><td>Lamp</td><td>1</td><td>$20.00</td><td>$20.00</td></tr>
        <tr><td>Shipping</td><td>$5.00</td></tr>
        <tr><td></td><td>1</td><td>$2</td><td>$2</td></tr>
        <tr><td>Cable</td><td>n/a</td><td>$3.00</td><td>$3.00</td></tr>
      </table>
    `;

    expect(extractTableItems(html)).toEqual([
      { name: 'Lamp', quantity: 1, unit_price: '20.00', total_price: '20.00' },
      { name: 'Cable', quantity: 1, unit_price: '3.00', total_price: '3.00' },
    ]);
  });

  it('only examines the first qualifying table', () => {
    const html = `
      <table>
        <tr><th>Qty</th><th>Price</th><th>Subtotal</th><th>Amount</th></tr>
        <tr><td>2</td><td>$3.00</td><td>$6.00</td><td>$6.00</td></tr>
      </table>
      <table>
        <tr><th>Item</th><th>Quantity</th><th>Price</th></tr>
        <tr><td>Pencil</td><td>2</td><td>$3.00</td></tr>
      </table>
    `;

    expect(extractTableItems(html)).toEqual([]);
  });
});
