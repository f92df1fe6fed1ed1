export const FIELD_KEYS = [
  'vendor_name',
  'amount_due',
  'date_due',
  'order_number',
  'order_date',
  'total_amount',
  'shipping_address',
  'tracking_number',
  'email_from',
] as const;

export type FieldKey = (typeof FIELD_KEYS)[number];

export type RawEmailBody = { kind: 'text'; text: string } | { kind: 'html'; html: string };

export type BodyKind = RawEmailBody['kind'];

export interface LineItem {
  name: string;
  quantity: number;
  unit_price?: string;
  total_price?: string;
}

export type ExtractedFields = Partial<Record<FieldKey, string>>;

export interface ExtractedRecord extends ExtractedFields {
  items?: LineItem[];
}

export type ColumnRole = 'name' | 'quantity' | 'price' | 'total';

export type TableColumnMap = ReadonlyMap<ColumnRole, number>;

export type ExtractorEngine = 'rules' | 'model';

export type ExportFormat = 'csv' | 'json' | 'xlsx';

export type MailProvider = 'imap';

export interface FetchedMailMessage {
  provider: MailProvider;
  messageId: string;
  subject: string;
  from: string;
  receivedAt: string;
  raw: Buffer;
}

export interface ParsedEmail {
  messageId: string;
  subject: string;
  from: string;
  receivedAt: string;
  bodyKind: BodyKind | null;
  record: ExtractedRecord;
}
