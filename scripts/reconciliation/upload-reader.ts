/**
 * Upload Reader
 *
 * Turns an uploaded delimited text file or workbook into a header-ordered
 * dataset. Cell values are kept as they come; identifier cleanup happens in
 * the extractor.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { UploadFormatError } from '../lib/error-handler';
import { toCellValue } from './dataset';
import { CellValue, RawRow, TabularDataset } from './types';

const DELIMITED_EXTENSIONS = new Set(['.csv', '.txt']);
const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls']);

export interface UploadOptions {
  /** Workbook sheet; defaults to the first one */
  sheet?: string;
}

function toUploadValue(value: unknown): CellValue {
  if (typeof value === 'string' && value.trim() === '') return null;
  return toCellValue(value);
}

/**
 * Empty headers become "Unnamed: <i>", repeated ones get ".1", ".2", ...
 */
export function buildHeader(cells: unknown[]): string[] {
  const seen = new Map<string, number>();
  return cells.map((cell, index) => {
    const text = cell === null || cell === undefined ? '' : String(cell).replace(/^\uFEFF/, '').trim();
    const base = text || `Unnamed: ${index}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

/**
 * First row is the header. Rows with no value at all are dropped.
 */
export function matrixToDataset(matrix: unknown[][]): TabularDataset {
  if (matrix.length === 0) {
    return { columns: [], rows: [] };
  }

  const width = matrix.reduce((widest, line) => Math.max(widest, line.length), 0);
  const headerCells = [...matrix[0]];
  while (headerCells.length < width) headerCells.push(null);
  const columns = buildHeader(headerCells);

  const rows: RawRow[] = [];
  for (const line of matrix.slice(1)) {
    const row: RawRow = {};
    let hasValue = false;
    columns.forEach((column, index) => {
      const value = toUploadValue(line[index]);
      row[column] = value;
      if (value !== null) hasValue = true;
    });
    if (hasValue) rows.push(row);
  }

  return { columns, rows };
}

/**
 * ';' is the usual separator in files exported with a Brazilian locale
 */
export function detectDelimiter(text: string): ';' | ',' {
  const firstLine = text.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0] ?? '';
  const semicolons = firstLine.split(';').length - 1;
  const commas = firstLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
}

export function parseDelimited(text: string): TabularDataset {
  const records: string[][] = parse(text, {
    bom: true,
    delimiter: detectDelimiter(text),
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return matrixToDataset(records);
}

export function listSheets(content: Buffer): string[] {
  return XLSX.read(content, { type: 'buffer', bookSheets: true }).SheetNames;
}

export function parseWorkbook(content: Buffer, options: UploadOptions = {}): TabularDataset {
  const workbook = XLSX.read(content, { type: 'buffer', cellDates: true });
  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new UploadFormatError(
      `Sheet "${options.sheet ?? ''}" not found. Available: ${workbook.SheetNames.join(', ')}`
    );
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });
  return matrixToDataset(matrix);
}

export function parseUpload(content: Buffer, fileName: string, options: UploadOptions = {}): TabularDataset {
  const extension = path.extname(fileName).toLowerCase();
  if (DELIMITED_EXTENSIONS.has(extension)) {
    return parseDelimited(content.toString('utf-8'));
  }
  if (WORKBOOK_EXTENSIONS.has(extension)) {
    return parseWorkbook(content, options);
  }
  throw new UploadFormatError(`Unsupported upload format "${extension || fileName}" (expected .csv, .txt, .xlsx, .xlsm or .xls)`);
}

export function readUpload(filePath: string, options: UploadOptions = {}): TabularDataset {
  if (!fs.existsSync(filePath)) {
    throw new UploadFormatError(`File not found: ${filePath}`);
  }
  return parseUpload(fs.readFileSync(filePath), filePath, options);
}
