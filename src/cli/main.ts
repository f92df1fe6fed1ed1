#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { config, EXTRACTOR_ENGINES } from '../config.js';
import { logger } from '../logger.js';
import { ImapConnector } from '../connectors/imap/imapConnector.js';
import { ImapFetchService } from '../connectors/imap/fetchService.js';
import { isBodyKindHint, toRawEmailBody } from '../pipeline/detect/detector.js';
import { toExtractedRecord } from '../pipeline/extract/recordSchema.js';
import { exportRecords, parseExportFormat } from '../pipeline/export/recordExporter.js';
import { createModelExtractor } from '../pipeline/model/modelExtractor.js';
import { EmailProcessingService, ruleExtractor, type RecordExtractor } from '../pipeline/processEmail.js';
import { createServer } from '../server/httpServer.js';
import type { ExtractedRecord } from '../types.js';

function resolveExtractor(engine: string): RecordExtractor {
  const choice = EXTRACTOR_ENGINES.find((candidate) => candidate === engine);
  if (!choice) {
    throw new Error(`Unsupported engine: ${engine}`);
  }
  if (choice === 'rules') {
    return ruleExtractor;
  }
  const model = createModelExtractor();
  if (!model) {
    throw new Error('Missing required env var: OPENAI_API_KEY');
  }
  return model;
}

function readRecords(filePath: string): ExtractedRecord[] {
  const payload: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(payload)) {
    throw new Error(`Expected a JSON array of records in ${filePath}`);
  }
  return payload.map((entry, index) => {
    const record = toExtractedRecord(entry);
    if (!record) {
      throw new Error(`Entry ${index} in ${filePath} is not a record`);
    }
    return record;
  });
}

const program = new Command();
program.name('order-mail-parser').description('Extract order data from email bodies').version('0.1.0');

program
  .command('parse')
  .description('Parse one email body and print the extracted record as JSON')
  .requiredOption('--input <input>', 'input file path or raw text')
  .option('--type <type>', 'auto|text|html', 'auto')
  .option('--engine <engine>', 'rules|model', config.extractor)
  .action(async (opts: { input: string; type: string; engine: string }) => {
    if (!isBodyKindHint(opts.type)) {
      throw new Error(`Unsupported type: ${opts.type}`);
    }
    const content = fs.existsSync(opts.input) ? fs.readFileSync(opts.input, 'utf8') : opts.input;
    const record = await resolveExtractor(opts.engine).extract(toRawEmailBody(content, opts.type));
    process.stdout.write(`${JSON.stringify(record, null, 2)}\n`);
  });

program
  .command('mail:fetch')
  .description('Fetch messages over IMAP, parse them and export the records')
  .option('--folder <folder>', 'mailbox folder', config.imapFolder)
  .option('--limit <limit>', 'max messages (most recent)', String(config.imapFetchLimit))
  .option('--criteria <criteria>', 'IMAP search criteria', config.imapCriteria)
  .option('--format <format>', 'csv|json|xlsx', config.exportFormat)
  .option('--engine <engine>', 'rules|model', config.extractor)
  .option('--out <dir>', 'output directory', config.outputDir)
  .action(
    async (opts: { folder: string; limit: string; criteria: string; format: string; engine: string; out: string }) => {
      const format = parseExportFormat(opts.format);
      const service = new ImapFetchService(
        new ImapConnector(),
        new EmailProcessingService(resolveExtractor(opts.engine)),
      );
      const parsed = await service.fetchAndParse({
        folder: opts.folder,
        limit: Number(opts.limit),
        criteria: opts.criteria,
      });
      if (!parsed.length) {
        logger.info({ folder: opts.folder }, 'No emails to export');
        return;
      }
      const outputPath = await exportRecords(
        parsed.map((email) => email.record),
        format,
        path.resolve(opts.out),
      );
      logger.info({ outputPath, emails: parsed.length }, 'Mail fetch done');
    },
  );

program
  .command('mail:folders')
  .description('List the mailbox folders available over IMAP')
  .action(async () => {
    const folders = await new ImapConnector().listFolders();
    process.stdout.write(folders.map((folder) => `${folder}\n`).join(''));
  });

program
  .command('export')
  .description('Export a JSON array of records to csv, json or xlsx')
  .requiredOption('--input <input>', 'JSON file with records')
  .option('--format <format>', 'csv|json|xlsx', config.exportFormat)
  .option('--out <dir>', 'output directory', config.outputDir)
  .action(async (opts: { input: string; format: string; out: string }) => {
    const records = readRecords(path.resolve(opts.input));
    const outputPath = await exportRecords(records, parseExportFormat(opts.format), path.resolve(opts.out));
    logger.info({ outputPath, records: records.length }, 'Export completed');
  });

program
  .command('serve')
  .description('Serve POST /parse over HTTP')
  .option('--port <port>', 'listen port', '3000')
  .option('--engine <engine>', 'rules|model', config.extractor)
  .action((opts: { port: string; engine: string }) => {
    const server = createServer(resolveExtractor(opts.engine));
    server.listen(Number(opts.port), () => {
      logger.info({ port: Number(opts.port) }, 'HTTP server listening');
    });
  });

program.parseAsync().catch((error) => {
  logger.error({ err: error }, 'CLI failed');
  process.exitCode = 1;
});
