import OpenAI from 'openai';
import { config } from '../../config.js';
import { logger } from '../../logger.js';
import type { ExtractedRecord, RawEmailBody } from '../../types.js';
import { toExtractedRecord } from '../extract/recordSchema.js';
import { normalizeHtml } from '../normalize/index.js';
import type { RecordExtractor } from '../processEmail.js';
import { buildModelPrompt, SYSTEM_PROMPT } from './prompt.js';

export type CompletionFn = (prompt: { system: string; user: string }) => Promise<string | null>;

export class ModelDecodeError extends Error {
  constructor(
    message: string,
    readonly content: string,
  ) {
    super(message);
    this.name = 'ModelDecodeError';
  }
}

export interface OpenAiCompletionOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
}

export function createOpenAiCompletion(options: OpenAiCompletionOptions): CompletionFn {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });

  return async ({ system, user }) => {
    const response = await client.chat.completions.create({
      model: options.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      response_format: { type: 'json_object' },
      temperature: 0,
    });
    return response.choices[0]?.message?.content ?? null;
  };
}

function stripCodeFence(content: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(content.trim());
  return fenced ? fenced[1] : content.trim();
}

export function decodeModelRecord(content: string): ExtractedRecord {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(content));
  } catch {
    throw new ModelDecodeError('Model response is not valid JSON', content);
  }

  const record = toExtractedRecord(payload);
  if (!record) {
    throw new ModelDecodeError('Model response is not a JSON object', content);
  }
  return record;
}

/**
 * Alternate extractor backed by a chat completion model. Same output contract as the
 * rule engine; an undecodable reply is logged and read as an empty record.
 */
export class ModelExtractor implements RecordExtractor {
  constructor(private readonly complete: CompletionFn) {}

  async extract(body: RawEmailBody): Promise<ExtractedRecord> {
    return this.extractFromText(body.kind === 'html' ? normalizeHtml(body.html) : body.text);
  }

  async extractFromText(text: string): Promise<ExtractedRecord> {
    const start = Date.now();
    const content = await this.complete({ system: SYSTEM_PROMPT, user: buildModelPrompt(text) });

    try {
      const record = decodeModelRecord(content ?? '');
      logger.debug({ totalMs: Date.now() - start, fields: Object.keys(record).length }, 'Model extraction done');
      return record;
    } catch (error) {
      if (error instanceof ModelDecodeError) {
        logger.warn({ err: error, totalMs: Date.now() - start }, 'Model response could not be decoded');
        return {};
      }
      throw error;
    }
  }
}

export function createModelExtractor(): ModelExtractor | null {
  if (!config.openaiApiKey) {
    return null;
  }
  return new ModelExtractor(
    createOpenAiCompletion({
      apiKey: config.openaiApiKey,
      model: config.openaiModel,
      baseURL: config.openaiBaseUrl,
      timeoutMs: config.openaiTimeoutMs,
    }),
  );
}
