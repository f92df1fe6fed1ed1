const INTEGER_PATTERN = /\d+/;

export function parseQty(input: string): number | null {
  const match = INTEGER_PATTERN.exec(input);
  if (!match) {
    return null;
  }
  const qty = Number.parseInt(match[0], 10);
  return Number.isFinite(qty) ? qty : null;
}

export function normalizeQty(qty: number | null | undefined): number {
  return qty != null && Number.isInteger(qty) && qty > 0 ? qty : 1;
}
