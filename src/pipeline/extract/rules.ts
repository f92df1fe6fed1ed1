export interface ExtractionRule {
  pattern: RegExp;
  accept?: (value: string) => boolean;
}

export const hasDigit = (value: string): boolean => /\d/.test(value);

/**
 * Tries `rules` in order against the first occurrence of each pattern. A rule whose
 * capture fails `accept` hands over to the next rule; the first accepted capture is
 * returned trimmed, even when that leaves it empty.
 */
export function firstMatch(text: string, rules: readonly ExtractionRule[]): string | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (!match) {
      continue;
    }
    const value = (match[1] ?? '').trim();
    if (rule.accept && !rule.accept(value)) {
      continue;
    }
    return value;
  }
  return undefined;
}
