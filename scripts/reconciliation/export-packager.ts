/**
 * Export Packager
 *
 * Serializes named datasets into one xlsx workbook. Empty sheets are skipped
 * except the primary one, which is always written (header row only if need be).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { ExportFailureError } from '../lib/error-handler';
import { formatDateStamp } from '../lib/date-input';
import { CellValue, TabularDataset } from './types';

export const MAX_SHEET_NAME_LENGTH = 31;
export const COLUMN_PADDING = 2;
export const MAX_COLUMN_WIDTH = 60;

export interface NamedSheet {
  name: string;
  dataset: TabularDataset;
  primary?: boolean;
}

export function sanitizeSheetName(name: string, fallback = 'Dados'): string {
  const cleaned = name.replace(/[\\/*?:[\]]/g, '').trim().slice(0, MAX_SHEET_NAME_LENGTH).trim();
  return cleaned || fallback;
}

/**
 * Windows-safe file name; never empty
 */
export function sanitizeFileName(name: string): string {
  return name.replace(/[<>:"/\\|?*]+/g, '-').trim() || 'export';
}

export function buildReportFileName(prefix: string, date: Date = new Date()): string {
  return `${sanitizeFileName(prefix)}_${formatDateStamp(date)}.xlsx`;
}

function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

/**
 * width = min(max(longest value, header) + padding, cap)
 */
export function computeColumnWidths(dataset: TabularDataset): number[] {
  return dataset.columns.map(column => {
    let longest = column.length;
    for (const row of dataset.rows) {
      longest = Math.max(longest, cellText(row[column]).length);
    }
    return Math.min(longest + COLUMN_PADDING, MAX_COLUMN_WIDTH);
  });
}

function toWorksheet(dataset: TabularDataset): XLSX.WorkSheet {
  const matrix: CellValue[][] = [
    dataset.columns,
    ...dataset.rows.map(row => dataset.columns.map(column => row[column] ?? null)),
  ];
  const worksheet = XLSX.utils.aoa_to_sheet(matrix);
  worksheet['!cols'] = computeColumnWidths(dataset).map(wch => ({ wch }));
  return worksheet;
}

export function buildWorkbook(sheets: NamedSheet[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  for (const sheet of sheets) {
    if (!sheet.primary && sheet.dataset.rows.length === 0) {
      continue;
    }
    XLSX.utils.book_append_sheet(workbook, toWorksheet(sheet.dataset), sanitizeSheetName(sheet.name));
  }

  return workbook;
}

export function packageWorkbook(sheets: NamedSheet[]): Buffer {
  try {
    const workbook = buildWorkbook(sheets);
    if (workbook.SheetNames.length === 0) {
      throw new Error('workbook has no sheets');
    }
    const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(output)) {
      throw new Error('xlsx writer did not return a buffer');
    }
    return output;
  } catch (error) {
    throw new ExportFailureError('Failed to build workbook', error);
  }
}

export interface Artifact {
  fileName: string;
  content: Buffer;
}

function temporaryPath(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
}

function removeQuietly(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

/**
 * Write every artifact or none. Each file is written under a temporary name and
 * renamed into place once all of them are on disk; on failure the temporary
 * files and any already renamed artifact are removed.
 */
export function writeArtifacts(directory: string, artifacts: Artifact[]): string[] {
  const targets = artifacts.map(artifact => path.join(directory, artifact.fileName));
  const written: string[] = [];
  const placed: string[] = [];

  try {
    fs.mkdirSync(directory, { recursive: true });
    artifacts.forEach((artifact, index) => {
      const temporary = temporaryPath(targets[index]);
      written.push(temporary);
      fs.writeFileSync(temporary, artifact.content);
    });
    targets.forEach((target, index) => {
      fs.renameSync(written[index], target);
      placed.push(target);
    });
  } catch (error) {
    written.forEach(removeQuietly);
    placed.forEach(removeQuietly);
    const failed = targets.find(target => !placed.includes(target)) ?? directory;
    throw new ExportFailureError(`Failed to save ${failed}`, error);
  }

  return targets;
}

/**
 * Write one artifact, creating the output directory if needed
 */
export function writeArtifact(directory: string, fileName: string, content: Buffer): string {
  return writeArtifacts(directory, [{ fileName, content }])[0];
}
