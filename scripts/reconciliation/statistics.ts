import { TabularDataset } from './types';

export interface StatisticsRow {
  value: string;
  count: number;
}

export interface StatisticsResult {
  rows: StatisticsRow[];
  /** Set when there was nothing to count */
  warning: string | null;
}

/**
 * Frequency of each distinct value of `column`, most frequent first. Ties keep
 * the order in which the values first appear. Empty cells are not counted.
 */
export function aggregateStatistics(dataset: TabularDataset, column: string): StatisticsResult {
  const unavailable = `Não foi possível gerar a estatística (coluna '${column}' ausente ou sem dados).`;
  if (dataset.rows.length === 0 || !dataset.columns.includes(column)) {
    return { rows: [], warning: unavailable };
  }

  const counts = new Map<string, number>();
  for (const row of dataset.rows) {
    const value = row[column];
    if (value === null || value === undefined || value === '') continue;
    const key = value instanceof Date ? value.toISOString() : String(value);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so Map insertion order settles ties
  const rows = Array.from(counts, ([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);

  return { rows, warning: rows.length === 0 ? unavailable : null };
}

export function statisticsDataset(
  rows: StatisticsRow[],
  valueColumn: string,
  totalColumn = 'Total'
): TabularDataset {
  return {
    columns: [valueColumn, totalColumn],
    rows: rows.map(row => ({ [valueColumn]: row.value, [totalColumn]: row.count })),
  };
}
