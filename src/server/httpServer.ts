import http from 'node:http';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { isBodyKindHint, toRawEmailBody } from '../pipeline/detect/detector.js';
import { ruleExtractor, type RecordExtractor } from '../pipeline/processEmail.js';

/** Resolves null once the body passes `maxBytes`; the rest of the request is drained unread. */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBytes) {
        req.off('data', onData);
        req.resume();
        resolve(null);
        return;
      }
      chunks.push(chunk);
    };

    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

export function createServer(extractor: RecordExtractor = ruleExtractor, maxBodyChars: number = config.maxBodyChars) {
  return http.createServer(async (req, res) => {
    try {
      if (!req.url || !req.method) {
        res.writeHead(400).end('Bad request');
        return;
      }

      const url = new URL(req.url, 'http://localhost');
      if (req.method === 'POST' && url.pathname === '/parse') {
        const type = url.searchParams.get('type') ?? 'auto';
        if (!isBodyKindHint(type)) {
          res.writeHead(400).end(`Unsupported type: ${type}`);
          return;
        }

        const content = await readBody(req, maxBodyChars);
        if (content === null) {
          res.writeHead(413).end('Body too large');
          return;
        }

        const record = await extractor.extract(toRawEmailBody(content, type));
        res.writeHead(200, { 'content-type': 'application/json' }).end(JSON.stringify(record));
        return;
      }

      res.writeHead(404).end('Not found');
    } catch (error) {
      logger.error({ err: error, url: req.url }, 'Request failed');
      res.writeHead(500).end(String(error));
    }
  });
}
