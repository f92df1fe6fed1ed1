import { FIELD_KEYS } from '../../types.js';

export const SYSTEM_PROMPT =
  'You extract structured order data from emails. Reply with one JSON object and nothing else.';

const FIELD_HINTS: Record<(typeof FIELD_KEYS)[number], string> = {
  vendor_name: 'the merchant or company that sent the order',
  amount_due: 'amount still to be paid, digits and decimal point only, no currency symbol',
  date_due: 'payment due date as written in the email',
  order_number: 'order, confirmation or invoice identifier',
  order_date: 'date the order was placed as written in the email',
  total_amount: 'order total, digits and decimal point only, no currency symbol',
  shipping_address: 'full delivery address on one line, parts separated by ", "',
  tracking_number: 'shipment tracking number',
  email_from: 'sender email address',
};

export function buildModelPrompt(emailText: string): string {
  const fields = FIELD_KEYS.map((key) => `- ${key}: ${FIELD_HINTS[key]}`).join('\n');
  return [
    'Extract the following fields from the email content. Use null for anything not present.',
    fields,
    '- items: array of { "name": string, "quantity": integer, "unit_price": string, "total_price": string }',
    '',
    'Email Content:',
    emailText,
  ].join('\n');
}
