import { simpleParser, type ParsedMail } from 'mailparser';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { ExtractedRecord, FetchedMailMessage, ParsedEmail, RawEmailBody } from '../types.js';
import { parse } from './extract/index.js';

export interface RecordExtractor {
  extract(body: RawEmailBody): Promise<ExtractedRecord>;
}

export const ruleExtractor: RecordExtractor = {
  extract: async (body) => parse(body),
};

export function selectBody(parsed: Pick<ParsedMail, 'html' | 'text'>): RawEmailBody | null {
  if (typeof parsed.html === 'string' && parsed.html.trim()) {
    return { kind: 'html', html: parsed.html };
  }
  if (parsed.text?.trim()) {
    return { kind: 'text', text: parsed.text };
  }
  return null;
}

export function limitBody(body: RawEmailBody, maxChars: number): RawEmailBody {
  if (body.kind === 'html') {
    return body.html.length > maxChars ? { kind: 'html', html: body.html.slice(0, maxChars) } : body;
  }
  return body.text.length > maxChars ? { kind: 'text', text: body.text.slice(0, maxChars) } : body;
}

function bodyLength(body: RawEmailBody): number {
  return body.kind === 'html' ? body.html.length : body.text.length;
}

export class EmailProcessingService {
  constructor(
    private readonly extractor: RecordExtractor = ruleExtractor,
    private readonly maxBodyChars: number = config.maxBodyChars,
  ) {}

  async processMessage(message: FetchedMailMessage): Promise<ParsedEmail> {
    const start = Date.now();
    const parsed = await simpleParser(message.raw);
    const meta = {
      messageId: parsed.messageId ?? message.messageId,
      subject: parsed.subject ?? message.subject,
      from: parsed.from?.text ?? message.from,
      receivedAt: parsed.date?.toISOString() ?? message.receivedAt,
    };

    const body = selectBody(parsed);
    if (!body) {
      logger.warn({ messageId: meta.messageId }, 'Email has no text or html body');
      return { ...meta, bodyKind: null, record: {} };
    }

    if (bodyLength(body) > this.maxBodyChars) {
      logger.warn(
        { messageId: meta.messageId, length: bodyLength(body), maxBodyChars: this.maxBodyChars },
        'Email body truncated before extraction',
      );
    }

    const record = await this.extractor.extract(limitBody(body, this.maxBodyChars));
    logger.info(
      {
        messageId: meta.messageId,
        bodyKind: body.kind,
        fields: Object.keys(record).filter((key) => key !== 'items').length,
        items: record.items?.length ?? 0,
        totalMs: Date.now() - start,
      },
      'Email processed',
    );

    return { ...meta, bodyKind: body.kind, record };
  }

  async processMessages(messages: FetchedMailMessage[]): Promise<ParsedEmail[]> {
    const out: ParsedEmail[] = [];
    for (const message of messages) {
      try {
        out.push(await this.processMessage(message));
      } catch (error) {
        logger.error({ err: error, messageId: message.messageId }, 'Email processing failed');
      }
    }
    return out;
  }
}
