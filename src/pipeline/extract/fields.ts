import { FIELD_KEYS, type ExtractedFields, type FieldKey } from '../../types.js';
import { takeBlock } from '../../utils/text.js';
import { findAdjacentCellAmount } from './htmlCells.js';
import { firstMatch, hasDigit, type ExtractionRule } from './rules.js';

export type FieldExtractor = (text: string, html?: string) => string | undefined;

const VENDOR_RULES: ExtractionRule[] = [
  { pattern: /(?:From|Vendor|Seller|Company)[:\s]+([A-Za-z0-9 \t,.]{1,100})(?=\n|<|,|\()/i },
  { pattern: /Thank you for (?:your order|shopping) (?:from|with|at) ([A-Za-z0-9 \t,.&]+)/i },
  { pattern: /([A-Za-z0-9 \t,.&]{1,100}) Order Confirmation/i },
  { pattern: /Welcome to ([A-Za-z0-9 \t,.&]+)/i },
];

const HEADER_LINE_NOISE = /@|http|www|subject|dear|hi\s|hello/i;
const COPYRIGHT_LINE = /©|copyright|all rights reserved/i;
const COPYRIGHT_HOLDER = /(?:©|copyright|all rights reserved)[,\s]+([A-Za-z0-9 \t,.&]+)/i;

const AMOUNT_DUE_RULES: ExtractionRule[] = [
  { pattern: /(?:Amount\s*Due|Balance\s*Due|Total\s*Due|Payment\s*Due)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Total\s*Amount\s*Due|Payment\s*Amount)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Please\s*Pay|Pay\s*Now)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Total\s*Balance|Outstanding\s*Balance)[:\s]*[$€£]?([0-9,.]+)/i },
];
const AMOUNT_DUE_CELL = /amount\s*due/i;

const DATE_DUE_RULES: ExtractionRule[] = [
  {
    pattern: /(?:Due\s*Date|Payment\s*Due\s*(?:Date|By|On)|Date\s*Due)[:\s]*([A-Za-z0-9, \t]+)/i,
    accept: hasDigit,
  },
  { pattern: /(?:Pay\s*By|Payment\s*Deadline)[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
  { pattern: /(?:due\s*on|due\s*by)[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
];

const ORDER_NUMBER_RULES: ExtractionRule[] = [
  { pattern: /Order\s*(?:Number|#|No\.)[:\s]*([A-Za-z0-9\-_]+)/i },
  { pattern: /(?:order|confirmation)[:\s]*#?\s*([A-Za-z0-9\-_]+)/i },
  { pattern: /Reference\s*(?:Number|#)[:\s]*([A-Za-z0-9\-_]+)/i },
  { pattern: /(?:Invoice|Receipt)\s*(?:Number|#)[:\s]*([A-Za-z0-9\-_]+)/i },
];

const ORDER_DATE_RULES: ExtractionRule[] = [
  { pattern: /Order\s*Date[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
  { pattern: /Date\s*(?:of|on)[:\s]*Order[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
  { pattern: /Ordered\s*on[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
  { pattern: /Purchase\s*Date[:\s]*([A-Za-z0-9, \t]+)/i, accept: hasDigit },
];

const TOTAL_AMOUNT_RULES: ExtractionRule[] = [
  { pattern: /(?:Order\s*Total|Total)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Total\s*Amount|Grand\s*Total)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Amount|Payment)[:\s]*[$€£]?([0-9,.]+)/i },
  { pattern: /(?:Charged|Price)[:\s]*[$€£]?([0-9,.]+)/i },
];
const TOTAL_AMOUNT_CELL = /(?:order\s*total|total\s*amount|grand\s*total)/i;

const SHIPPING_LABELS: RegExp[] = [
  /(?:Shipping|Delivery)\s*Address[:\s]*/i,
  /(?:Ship\s*To|Deliver\s*To)[:\s]*/i,
  /(?:Shipped\s*To|Delivered\s*To)[:\s]*/i,
];

const TRACKING_RULES: ExtractionRule[] = [
  { pattern: /(?:Tracking\s*(?:Number|#)|Track\s*Your\s*Package)[:\s]*([A-Za-z0-9]+)/i },
  { pattern: /(?:Tracking\s*ID|Shipment\s*ID)[:\s]*([A-Za-z0-9]+)/i },
  { pattern: /(?:Your\s*package\s*can\s*be\s*tracked\s*with)[:\s]*([A-Za-z0-9]+)/i },
  { pattern: /(?:Track)[:\s]*.*?(?:number)[:\s]*([A-Za-z0-9]+)/i },
];

const EMAIL_FROM_RULES: ExtractionRule[] = [
  { pattern: /From:[:\s]*([A-Za-z0-9 \t,.@<>]+)/i },
  { pattern: /Sender:[:\s]*([A-Za-z0-9 \t,.@<>]+)/i },
  { pattern: /([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/i },
];
const BRACKETED_ADDRESS = /<([^>]+)>/;

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export function extractVendorName(text: string): string | undefined {
  const fromLabel = firstMatch(text, VENDOR_RULES);
  if (fromLabel !== undefined) {
    return nonEmpty(fromLabel);
  }

  const lines = text.split('\n');
  for (const line of lines.slice(0, 5)) {
    const trimmed = line.trim();
    if (trimmed.length > 0 && trimmed.length < 50 && !HEADER_LINE_NOISE.test(line)) {
      return trimmed;
    }
  }

  // Signature area, bottom up.
  const stop = Math.max(0, lines.length - 10);
  for (let i = lines.length - 1; i > stop; i -= 1) {
    if (!COPYRIGHT_LINE.test(lines[i])) {
      continue;
    }
    const holder = COPYRIGHT_HOLDER.exec(lines[i]);
    if (holder) {
      return nonEmpty(holder[1].trim());
    }
  }

  return undefined;
}

export function extractTotalAmount(text: string, html?: string): string | undefined {
  const fromText = firstMatch(text, TOTAL_AMOUNT_RULES);
  if (fromText !== undefined) {
    return nonEmpty(fromText);
  }
  return html ? findAdjacentCellAmount(html, TOTAL_AMOUNT_CELL) : undefined;
}

export function extractAmountDue(text: string, html?: string): string | undefined {
  const fromText = firstMatch(text, AMOUNT_DUE_RULES);
  if (fromText !== undefined) {
    return nonEmpty(fromText);
  }
  const fromCell = html ? findAdjacentCellAmount(html, AMOUNT_DUE_CELL) : undefined;
  return fromCell ?? extractTotalAmount(text, html);
}

export function extractDateDue(text: string): string | undefined {
  return nonEmpty(firstMatch(text, DATE_DUE_RULES));
}

export function extractOrderNumber(text: string): string | undefined {
  return nonEmpty(firstMatch(text, ORDER_NUMBER_RULES));
}

export function extractOrderDate(text: string): string | undefined {
  return nonEmpty(firstMatch(text, ORDER_DATE_RULES));
}

export function extractShippingAddress(text: string): string | undefined {
  for (const label of SHIPPING_LABELS) {
    const match = label.exec(text);
    if (!match) {
      continue;
    }
    const address = takeBlock(text, match.index + match[0].length)
      .trim()
      .replace(/\n+/g, ', ')
      .replace(/\s+/g, ' ');
    return nonEmpty(address);
  }
  return undefined;
}

export function extractTrackingNumber(text: string): string | undefined {
  return nonEmpty(firstMatch(text, TRACKING_RULES));
}

export function extractEmailFrom(text: string): string | undefined {
  const sender = firstMatch(text, EMAIL_FROM_RULES);
  if (!sender) {
    return undefined;
  }
  const bracketed = BRACKETED_ADDRESS.exec(sender);
  return bracketed ? nonEmpty(bracketed[1].trim()) : sender;
}

export const FIELD_EXTRACTORS: Record<FieldKey, FieldExtractor> = {
  vendor_name: extractVendorName,
  amount_due: extractAmountDue,
  date_due: extractDateDue,
  order_number: extractOrderNumber,
  order_date: extractOrderDate,
  total_amount: extractTotalAmount,
  shipping_address: extractShippingAddress,
  tracking_number: extractTrackingNumber,
  email_from: extractEmailFrom,
};

export function extractFields(text: string, html?: string): ExtractedFields {
  const fields: ExtractedFields = {};
  for (const key of FIELD_KEYS) {
    const value = FIELD_EXTRACTORS[key](text, html);
    if (value) {
      fields[key] = value;
    }
  }
  return fields;
}
