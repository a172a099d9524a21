/**
 * Reconciliation pipeline
 *
 * upload -> identifiers -> staged batch / source queries -> labels -> enriched
 * rows. Statistics over the label column feed an extra sheet of the full export.
 */

import { SourceConfig } from '../lib/config-loader';
import { AssembledReport, assembleReport } from './report-assembler';
import { NamedSheet } from './export-packager';
import { extractIdentifiers, findColumn } from './identifier-extractor';
import { resolveMemberships } from './membership-resolver';
import { SourceFailure, StagingStore, resolveBatch } from './source-query-adapter';
import { aggregateStatistics, StatisticsResult, statisticsDataset } from './statistics';
import { SourceSpec, TabularDataset } from './types';

export interface ReconcileOptions {
  identifierColumns: string[];
  /** Column after which Origem/Responsavel go; defaults to the identifier column */
  anchorColumn?: string | null;
  sources: SourceSpec[];
  bothLabel?: string;
  signal?: AbortSignal;
}

export type ReconciliationOutcome =
  | { status: 'empty'; identifierColumn: string }
  | {
      status: 'reconciled';
      identifierColumn: string;
      anchorColumn: string | null;
      identifierCount: number;
      report: AssembledReport;
      statistics: StatisticsResult;
      failures: SourceFailure[];
    };

export function toSourceSpecs(sources: SourceConfig[]): SourceSpec[] {
  return sources.map(source => ({
    name: source.name,
    primary: source.primary,
    scriptPath: source.script,
    identifierColumn: source.identifierColumn,
    attributeColumn: source.attributeColumn ?? null,
  }));
}

export async function reconcileUpload(
  table: TabularDataset,
  store: StagingStore,
  options: ReconcileOptions
): Promise<ReconciliationOutcome> {
  const extraction = extractIdentifiers(table, options.identifierColumns);
  if (extraction.status === 'empty') {
    return { status: 'empty', identifierColumn: extraction.column };
  }

  const { resultSets, failures } = await resolveBatch(
    extraction.identifiers,
    options.sources,
    store,
    { signal: options.signal }
  );

  const resolved = resolveMemberships(
    extraction.identifiers,
    resultSets,
    options.sources.map(source => source.name),
    { bothLabel: options.bothLabel }
  );

  const anchorColumn = options.anchorColumn
    ? findColumn(table.columns, [options.anchorColumn])
    : extraction.column;

  const report = assembleReport(table, extraction.column, resolved, anchorColumn);
  const statistics = aggregateStatistics(report.full, report.originColumn);

  return {
    status: 'reconciled',
    identifierColumn: extraction.column,
    anchorColumn,
    identifierCount: resolved.size,
    report,
    statistics,
    failures,
  };
}

/**
 * Sheets of the two workbooks: the full upload with its statistics, and the
 * matched rows alone
 */
export function reconciliationSheets(report: AssembledReport, statistics: StatisticsResult): {
  full: NamedSheet[];
  matchesOnly: NamedSheet[];
} {
  return {
    full: [
      { name: 'Dados', dataset: report.full, primary: true },
      { name: 'Estatistica', dataset: statisticsDataset(statistics.rows, report.originColumn) },
    ],
    matchesOnly: [
      { name: 'Dados', dataset: report.matchesOnly, primary: true },
    ],
  };
}
