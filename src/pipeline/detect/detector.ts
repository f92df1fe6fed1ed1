import type { BodyKind, RawEmailBody } from '../../types.js';

const HTML_ELEMENT = /<\s*(?:html|body|table|div|p|br|span|td|tr)\b[^>]*>/i;

export type BodyKindHint = BodyKind | 'auto';

export function detectBodyKind(content: string): BodyKind {
  return HTML_ELEMENT.test(content) ? 'html' : 'text';
}

export function toRawEmailBody(content: string, hint: BodyKindHint = 'auto'): RawEmailBody {
  const kind = hint === 'auto' ? detectBodyKind(content) : hint;
  return kind === 'html' ? { kind, html: content } : { kind, text: content };
}

export function isBodyKindHint(value: string): value is BodyKindHint {
  return value === 'auto' || value === 'text' || value === 'html';
}
