import path from 'node:path';
import dotenv from 'dotenv';
import type { ExportFormat, ExtractorEngine } from './types.js';

dotenv.config();

const cwd = process.cwd();

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value == null) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function asChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const normalized = value?.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json', 'xlsx'];
export const EXTRACTOR_ENGINES: readonly ExtractorEngine[] = ['rules', 'model'];

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  outputDir: process.env.OUTPUT_DIR ?? path.join(cwd, 'exports'),
  exportFormat: asChoice(process.env.EXPORT_FORMAT, EXPORT_FORMATS, 'csv'),
  maxBodyChars: asNumber(process.env.MAX_BODY_CHARS, 500_000),

  imapHost: process.env.IMAP_HOST ?? '',
  imapPort: asNumber(process.env.IMAP_PORT, 993),
  imapSecure: asBool(process.env.IMAP_SECURE, true),
  imapUser: process.env.IMAP_USER ?? '',
  imapPassword: process.env.IMAP_PASSWORD ?? '',
  imapFolder: process.env.IMAP_FOLDER ?? 'INBOX',
  imapFetchLimit: asNumber(process.env.IMAP_FETCH_LIMIT, 10),
  imapCriteria: process.env.IMAP_CRITERIA ?? 'ALL',
  imapMarkSeen: asBool(process.env.IMAP_MARK_SEEN, false),

  extractor: asChoice(process.env.EXTRACTOR, EXTRACTOR_ENGINES, 'rules'),
  openaiApiKey: process.env.OPENAI_API_KEY ?? '',
  openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
  openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
  openaiTimeoutMs: asNumber(process.env.OPENAI_TIMEOUT_MS, 30000),
};

export function requireEnv(value: string, name: string): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}
