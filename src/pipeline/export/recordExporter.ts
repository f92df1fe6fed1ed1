import fs from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { EXPORT_FORMATS } from '../../config.js';
import { logger } from '../../logger.js';
import type { ExportFormat, ExtractedRecord } from '../../types.js';
import { collectColumns, flattenRecord } from './flatten.js';

export function parseExportFormat(value: string): ExportFormat {
  const format = EXPORT_FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new Error(`Unsupported format: ${value}`);
  }
  return format;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function exportFileName(format: ExportFormat, now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `email_data_${date}_${time}.${format}`;
}

function buildWorkbook(records: ExtractedRecord[]): ExcelJS.Workbook {
  const rows = records.map(flattenRecord);
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('records');

  sheet.columns = collectColumns(rows).map((key) => ({
    header: key,
    key,
    width: Math.min(48, Math.max(12, key.length + 2)),
  }));

  for (const row of rows) {
    sheet.addRow(row);
  }

  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
  return workbook;
}

export async function exportRecords(
  records: ExtractedRecord[],
  format: ExportFormat,
  outputDir: string,
  now: Date = new Date(),
): Promise<string> {
  fs.mkdirSync(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, exportFileName(format, now));

  if (format === 'json') {
    fs.writeFileSync(outputPath, JSON.stringify(records, null, 4));
  } else if (format === 'csv') {
    await buildWorkbook(records).csv.writeFile(outputPath);
  } else {
    await buildWorkbook(records).xlsx.writeFile(outputPath);
  }

  logger.info({ outputPath, format, records: records.length }, 'Records exported');
  return outputPath;
}
