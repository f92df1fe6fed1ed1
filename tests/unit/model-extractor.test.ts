import { describe, expect, it, vi } from 'vitest';
import { config } from '../../src/config.js';
import {
  createModelExtractor,
  decodeModelRecord,
  ModelDecodeError,
  ModelExtractor,
  type CompletionFn,
} from '../../src/pipeline/model/modelExtractor.js';

describe('decodeModelRecord', () => {
  it('keeps known fields and valid items', () => {
    const content = JSON.stringify({
      vendor_name: 'Acme',
      total_amount: 42.5,
      date_due: null,
      items: [{ name: 'Widget', quantity: '3 units', unit_price: 9.99 }, { quantity: 2 }],
    });

    expect(decodeModelRecord(content)).toEqual({
      vendor_name: 'Acme',
      total_amount: '42.5',
      items: [{ name: 'Widget', quantity: 3, unit_price: '9.99' }],
    });
  });

  it('strips a code fence', () => {
    expect(decodeModelRecord('```json\n{"order_number": "A1"}\n```')).toEqual({ order_number: 'A1' });
  });

  it('rejects invalid json', () => {
    expect(() => decodeModelRecord('not json')).toThrow(ModelDecodeError);
  });

  it('rejects json that is not an object', () => {
    expect(() => decodeModelRecord('[1, 2]')).toThrow(ModelDecodeError);
  });
});

describe('ModelExtractor', () => {
  it('sends normalized html text to the model', async () => {
    const complete = vi.fn<CompletionFn>(async () => '{"order_number": "7"}');
    const extractor = new ModelExtractor(complete);

    const record = await extractor.extract({ kind: 'html', html: '<p>Order #: 7</p>' });

    expect(record).toEqual({ order_number: '7' });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].user.endsWith('Email Content:\nOrder #: 7')).toBe(true);
  });

  it('returns an empty record when the reply cannot be decoded', async () => {
    const extractor = new ModelExtractor(async () => 'sorry, no json today');
    await expect(extractor.extract({ kind: 'text', text: 'Order #: 7' })).resolves.toEqual({});
  });

  it('returns an empty record for an empty reply', async () => {
    const extractor = new ModelExtractor(async () => null);
    await expect(extractor.extract({ kind: 'text', text: 'Order #: 7' })).resolves.toEqual({});
  });

  it('propagates transport errors', async () => {
    const extractor = new ModelExtractor(async () => {
      throw new Error('network down');
    });
    await expect(extractor.extract({ kind: 'text', text: 'Order #: 7' })).rejects.toThrow('network down');
  });
});

describe('createModelExtractor', () => {
  it('is disabled without an api key', () => {
    const previous = config.openaiApiKey;
    config.openaiApiKey = '';
    try {
      expect(createModelExtractor()).toBeNull();
    } finally {
      config.openaiApiKey = previous;
    }
  });

  it('builds an extractor when a key is configured', () => {
    const previous = config.openaiApiKey;
    config.openaiApiKey = 'test-secret';
    try {
      expect(createModelExtractor()).toBeInstanceOf(ModelExtractor);
    } finally {
      config.openaiApiKey = previous;
    }
  });
});
