/**
 * Report Assembler
 *
 * Puts the resolved labels back onto the uploaded rows. The schema change is
 * planned once and applied the same way to every row; rows are never dropped
 * or reordered.
 */

import { normalizeIdentifier } from './identifier-extractor';
import {
  ATTRIBUTE_COLUMN,
  Identifier,
  ORIGIN_COLUMN,
  RawRow,
  ResolvedIdentifier,
  TabularDataset,
} from './types';

export interface ColumnPlan {
  columns: string[];
  originColumn: string;
  attributeColumn: string;
}

export interface AssembledReport {
  full: TabularDataset;
  matchesOnly: TabularDataset;
  /** Actual names of the derived columns (suffixed if the upload had them) */
  originColumn: string;
  attributeColumn: string;
}

function uniqueName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) return name;
  let suffix = 1;
  while (taken.has(`${name}.${suffix}`)) suffix++;
  return `${name}.${suffix}`;
}

/**
 * Origem goes right after the anchor column and Responsavel right after
 * Origem; without an anchor both are appended.
 */
export function planColumns(columns: string[], anchorColumn: string | null): ColumnPlan {
  const taken = new Set(columns);
  const originColumn = uniqueName(ORIGIN_COLUMN, taken);
  taken.add(originColumn);
  const attributeColumn = uniqueName(ATTRIBUTE_COLUMN, taken);

  const anchorIndex = anchorColumn === null ? -1 : columns.indexOf(anchorColumn);
  const insertAt = anchorIndex === -1 ? columns.length : anchorIndex + 1;

  return {
    columns: [
      ...columns.slice(0, insertAt),
      originColumn,
      attributeColumn,
      ...columns.slice(insertAt),
    ],
    originColumn,
    attributeColumn,
  };
}

export function assembleReport(
  table: TabularDataset,
  identifierColumn: string,
  resolved: Map<Identifier, ResolvedIdentifier>,
  anchorColumn: string | null
): AssembledReport {
  const plan = planColumns(table.columns, anchorColumn);

  const rows = table.rows.map(row => {
    const identifier = normalizeIdentifier(row[identifierColumn]);
    const match = identifier === null ? undefined : resolved.get(identifier);

    const enriched: RawRow = {};
    for (const column of plan.columns) {
      if (column === plan.originColumn) {
        enriched[column] = match?.label ?? null;
      } else if (column === plan.attributeColumn) {
        enriched[column] = match?.attribute ?? null;
      } else {
        enriched[column] = row[column] ?? null;
      }
    }
    return enriched;
  });

  return {
    full: { columns: plan.columns, rows },
    matchesOnly: {
      columns: plan.columns,
      rows: rows.filter(row => row[plan.originColumn] !== null),
    },
    originColumn: plan.originColumn,
    attributeColumn: plan.attributeColumn,
  };
}
