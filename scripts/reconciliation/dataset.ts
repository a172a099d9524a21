import { CellValue, RawRow, TabularDataset } from './types';

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (Buffer.isBuffer(value)) return value.toString('hex');
  return String(value);
}

/**
 * Strip characters spreadsheet headers choke on (\ / * ? : [ ]) and trim.
 * Names that collide after cleaning get a ".1", ".2", ... suffix.
 */
export function sanitizeColumns(dataset: TabularDataset): TabularDataset {
  const taken = new Set<string>();
  const renamed = dataset.columns.map(column => {
    const base = column.replace(/[\\/*?:[\]]/g, '').trim();
    let name = base;
    for (let suffix = 1; taken.has(name); suffix++) {
      name = `${base}.${suffix}`;
    }
    taken.add(name);
    return name;
  });

  const rows = dataset.rows.map(row => {
    const out: RawRow = {};
    dataset.columns.forEach((column, index) => {
      out[renamed[index]] = row[column] ?? null;
    });
    return out;
  });

  return { columns: renamed, rows };
}
