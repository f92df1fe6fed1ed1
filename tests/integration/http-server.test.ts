import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createServer } from '../../src/server/httpServer.js';

describe('http server', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer(undefined, 1000);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('parses a posted text body', async () => {
    const res = await fetch(`${baseUrl}/parse?type=text`, { method: 'POST', body: 'Order Total: $42.50' });
    const record: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(record).toMatchObject({ total_amount: '42.50', amount_due: '42.50' });
  });

  it('parses a posted html body', async () => {
    const html = '<table><tr><td>Amount Due</td><td>$88.10</td></tr></table>';
    const res = await fetch(`${baseUrl}/parse`, { method: 'POST', body: html });
    const record: unknown = await res.json();

    expect(record).toMatchObject({ amount_due: '88.10' });
  });

  it('rejects an unknown type', async () => {
    const res = await fetch(`${baseUrl}/parse?type=pdf`, { method: 'POST', body: 'x' });
    expect(res.status).toBe(400);
    expect(await res.text()).toBe('Unsupported type: pdf');
  });

  it('rejects oversized bodies', async () => {
    const res = await fetch(`${baseUrl}/parse`, { method: 'POST', body: 'x'.repeat(1001) });
    expect(res.status).toBe(413);
  });

  it('answers 413 before the request body ends', async () => {
    const status = await new Promise<number | undefined>((resolve, reject) => {
      const req = http.request(`${baseUrl}/parse`, { method: 'POST' }, (res) => {
        res.resume();
        resolve(res.statusCode);
        req.destroy();
      });
      req.on('error', reject);
      req.write('x'.repeat(2000));
    });

    expect(status).toBe(413);
  });

  it('answers 404 for other routes', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(404);
  });
});
