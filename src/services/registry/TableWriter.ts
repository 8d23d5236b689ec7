import { mkdir, writeFile } from 'fs/promises';
import { dirname, extname, join } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../../utils/logger.js';
import { OutputWriteError } from '../../utils/errors.js';
import type { OutputFormat } from '../../config/validation.js';
import type { OutputRow } from '../../types/terms.types.js';

export const OUTPUT_HEADER = ['name', 'ZH_CN', 'EN_US'] as const;
export const UTF8_BOM = '\uFEFF';
const SHEET_NAME = 'Glossary';

function toSheet(rows: readonly OutputRow[]): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet([[...OUTPUT_HEADER], ...rows.map(row => [row.id, row.zh, row.en])]);
}

/**
 * Comma-delimited, `\n` row separator; a field is quoted when it contains a
 * comma, a newline or a double quote.
 */
export function toCsv(rows: readonly OutputRow[]): string {
  const csv = XLSX.utils.sheet_to_csv(toSheet(rows), { FS: ',', RS: '\n', blankrows: false });
  return `${csv}\n`;
}

async function writeOutput(path: string, data: string | Uint8Array, rowCount: number): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  } catch (error) {
    logger.error({ error, path }, 'Failed to write glossary file');
    throw new OutputWriteError(`Cannot write ${path}`, path, error);
  }
  logger.info({ path, rows: rowCount }, 'Glossary file written');
}

export async function writeCsv(rows: readonly OutputRow[], path: string): Promise<void> {
  await writeOutput(path, UTF8_BOM + toCsv(rows), rows.length);
}

export async function writeXlsx(rows: readonly OutputRow[], path: string): Promise<void> {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, toSheet(rows), SHEET_NAME);
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await writeOutput(path, new Uint8Array(buffer), rows.length);
}

export function formatOf(path: string): OutputFormat {
  return extname(path).toLowerCase() === '.xlsx' ? 'xlsx' : 'csv';
}

export async function writeTable(rows: readonly OutputRow[], path: string): Promise<void> {
  if (formatOf(path) === 'xlsx') {
    await writeXlsx(rows, path);
  } else {
    await writeCsv(rows, path);
  }
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `glossary_YYYYMMDD_HHMMSS.<ext>`, one file per run. */
export function buildOutputPath(dir: string, format: OutputFormat, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(dir, `glossary_${date}_${time}.${format}`);
}
