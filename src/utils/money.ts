// Digit-led run of digits and separators, kept as written.
const AMOUNT_PATTERN = /[$€£]?\s*(\d[\d,.]*)/;

export function parsePrice(input: string): string | null {
  const match = AMOUNT_PATTERN.exec(input);
  return match ? match[1] : null;
}
