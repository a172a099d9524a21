/**
 * Identifier Extractor
 *
 * Finds the identifier column of an arbitrary upload (tolerant of case, accents
 * and spacing in the header) and pulls a clean sequence of identifiers out of it.
 */

import { ColumnNotFoundError } from '../lib/error-handler';
import { CellValue, Identifier, TabularDataset } from './types';

/** Placeholders some exporters write into empty cells */
const ABSENT_VALUES = new Set(['nan', 'None']);

export type ExtractionResult =
  | { status: 'extracted'; column: string; identifiers: Identifier[] }
  | { status: 'empty'; column: string };

/**
 * Lowercase, strip diacritics, trim and collapse internal whitespace
 */
export function normalizeColumnName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim()
    .replace(/\s+/g, ' ');
}

function compactColumnName(name: string): string {
  return normalizeColumnName(name).replace(/\s/g, '');
}

/**
 * Locate a column by its canonical names. Candidates are tried in order; the
 * second pass ignores every space so "Num Matricula" matches "nummatricula".
 */
export function findColumn(columns: string[], candidates: string[]): string | null {
  for (const normalize of [normalizeColumnName, compactColumnName]) {
    for (const candidate of candidates) {
      const wanted = normalize(candidate);
      const match = columns.find(column => normalize(column) === wanted);
      if (match !== undefined) {
        return match;
      }
    }
  }
  return null;
}

export function normalizeIdentifier(value: CellValue | undefined): Identifier | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = (value instanceof Date ? value.toISOString() : String(value)).trim();
  if (text === '' || ABSENT_VALUES.has(text)) {
    return null;
  }
  return text;
}

/**
 * Matching key of an identifier. Matriculas compare case-insensitively, the
 * same way the database's default collation joins them.
 */
export function identifierKey(identifier: Identifier): string {
  return identifier.toUpperCase();
}

/**
 * Extract one identifier per row that has one. Rows without a value are left
 * out of the sequence (they stay in the table for the assembler); duplicates
 * are kept.
 */
export function extractIdentifiers(table: TabularDataset, candidates: string[]): ExtractionResult {
  const column = findColumn(table.columns, candidates);
  if (column === null) {
    throw new ColumnNotFoundError(candidates, table.columns);
  }

  const identifiers: Identifier[] = [];
  for (const row of table.rows) {
    const identifier = normalizeIdentifier(row[column]);
    if (identifier !== null) {
      identifiers.push(identifier);
    }
  }

  if (identifiers.length === 0) {
    return { status: 'empty', column };
  }
  return { status: 'extracted', column, identifiers };
}
