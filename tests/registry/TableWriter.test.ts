import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as XLSX from 'xlsx';
import {
  UTF8_BOM,
  buildOutputPath,
  formatOf,
  toCsv,
  writeTable,
} from '../../src/services/registry/TableWriter.js';
import { OutputWriteError } from '../../src/utils/errors.js';
import type { OutputRow } from '../../src/types/terms.types.js';

const rows: OutputRow[] = [
  { id: 'A1B2C3', zh: '服务器', en: 'Server' },
  { id: 'D4E5F6', zh: '数据库', en: 'Database, relational' },
];

describe('toCsv', () => {
  it('writes the header and one line per row', () => {
    expect(toCsv(rows)).toBe('name,ZH_CN,EN_US\nA1B2C3,服务器,Server\nD4E5F6,数据库,"Database, relational"\n');
  });

  it('doubles quotes inside quoted fields', () => {
    expect(toCsv([{ id: '1', zh: '引号', en: 'say "hi"' }])).toBe('name,ZH_CN,EN_US\n1,引号,"say ""hi"""\n');
  });

  it('quotes a field with a line break', () => {
    expect(toCsv([{ id: '1', zh: '服务\n器', en: 'Server' }])).toBe('name,ZH_CN,EN_US\n1,"服务\n器",Server\n');
  });

  it('writes only the header for an empty table', () => {
    expect(toCsv([])).toBe('name,ZH_CN,EN_US\n');
  });
});

describe('writeTable', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'table-writer-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes UTF-8 CSV with a byte order mark', async () => {
    const path = join(dir, 'nested', 'glossary.csv');
    await writeTable(rows, path);

    const content = await readFile(path, 'utf-8');
    expect(content).toBe(`${UTF8_BOM}name,ZH_CN,EN_US\nA1B2C3,服务器,Server\nD4E5F6,数据库,"Database, relational"\n`);
  });

  it('writes an xlsx workbook for .xlsx paths', async () => {
    const path = join(dir, 'glossary.xlsx');
    await writeTable(rows, path);

    const workbook = XLSX.read(await readFile(path), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['Glossary']);
    const sheet = workbook.Sheets['Glossary'];
    expect(sheet).toBeDefined();
    if (!sheet) return;
    expect(XLSX.utils.sheet_to_json(sheet, { header: 1 })).toEqual([
      ['name', 'ZH_CN', 'EN_US'],
      ['A1B2C3', '服务器', 'Server'],
      ['D4E5F6', '数据库', 'Database, relational'],
    ]);
  });

  it('raises OutputWriteError when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const path = join(blocker, 'glossary.csv');

    const error = await writeTable(rows, path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OutputWriteError);
    expect(error).toMatchObject({ path, stage: 'output', code: 'OUTPUT_WRITE_ERROR' });
  });
});

describe('output naming', () => {
  it('stamps the file name with the local date and time', () => {
    const now = new Date(2024, 0, 5, 9, 3, 7);
    expect(buildOutputPath('out', 'csv', now)).toBe(join('out', 'glossary_20240105_090307.csv'));
    expect(buildOutputPath('out', 'xlsx', now)).toBe(join('out', 'glossary_20240105_090307.xlsx'));
  });

  it('picks the format from the extension', () => {
    expect(formatOf('terms.XLSX')).toBe('xlsx');
    expect(formatOf('terms.csv')).toBe('csv');
    expect(formatOf('terms')).toBe('csv');
  });
});
