export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

export function toUnixNewlines(input: string): string {
  return input.replace(/\r\n?/g, '\n');
}

/**
 * Slices `text` from `start` up to the first blank line or the first line that
 * opens with a capital letter, whichever comes first.
 */
export function takeBlock(text: string, start: number): string {
  const rest = text.slice(start);
  const end = rest.search(/\n\n|\n[A-Z]/);
  return end >= 0 ? rest.slice(0, end) : rest;
}
