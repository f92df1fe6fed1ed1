import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { exportFileName, exportRecords, parseExportFormat } from '../../src/pipeline/export/recordExporter.js';
import type { ExtractedRecord } from '../../src/types.js';

const NOW = new Date(2024, 0, 2, 3, 4, 5);

const RECORDS: ExtractedRecord[] = [
  { vendor_name: 'Acme', total_amount: '42.50', items: [{ name: 'Widget', quantity: 3 }] },
  { vendor_name: 'Bolt', order_number: 'B-7' },
];

describe('parseExportFormat', () => {
  it('accepts known formats in any case', () => {
    expect(parseExportFormat('XLSX')).toBe('xlsx');
  });

  it('rejects other formats', () => {
    expect(() => parseExportFormat('pdf')).toThrow('Unsupported format: pdf');
  });
});

describe('exportFileName', () => {
  it('stamps the local time', () => {
    expect(exportFileName('csv', NOW)).toBe('email_data_20240102_030405.csv');
  });
});

describe('exportRecords', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'order-mail-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes nested json', async () => {
    const outPath = await exportRecords(RECORDS, 'json', dir, NOW);

    expect(outPath).toBe(path.join(dir, 'email_data_20240102_030405.json'));
    expect(JSON.parse(fs.readFileSync(outPath, 'utf8'))).toEqual(RECORDS);
  });

  it('writes flattened csv', async () => {
    const outPath = await exportRecords(RECORDS, 'csv', dir, NOW);
    const lines = fs.readFileSync(outPath, 'utf8').split(/\r?\n/);

    expect(lines[0]).toBe('vendor_name,total_amount,item1_name,item1_quantity,order_number');
    expect(lines[1].startsWith('Acme,42.50,Widget,3')).toBe(true);
  });

  it('writes flattened xlsx', async () => {
    const outPath = await exportRecords(RECORDS, 'xlsx', dir, NOW);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(outPath);
    const sheet = workbook.getWorksheet('records');

    expect(sheet?.getRow(1).getCell(5).value).toBe('order_number');
    expect(sheet?.getRow(2).getCell(1).value).toBe('Acme');
    expect(sheet?.getRow(2).getCell(4).value).toBe(3);
    expect(sheet?.getRow(3).getCell(5).value).toBe('B-7');
  });
});
