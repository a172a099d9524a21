/**
 * Period report
 *
 * Runs a report definition's queries for a date range and lays the results out
 * as sheets: the primary dataset (always written), the secondary datasets
 * (skipped when empty) and a frequency table over the status column.
 */

import { formatDisplayDate } from '../lib/date-input';
import { sanitizeColumns } from '../reconciliation/dataset';
import { NamedSheet } from '../reconciliation/export-packager';
import { SourceFailure, querySource } from '../reconciliation/source-query-adapter';
import { aggregateStatistics, StatisticsResult, statisticsDataset } from '../reconciliation/statistics';
import { TabularDataset } from '../reconciliation/types';
import { ReportDefinition } from './report-definitions';

export interface ReportPeriod {
  start: Date;
  end: Date;   // inclusive
}

export interface QueryRunner {
  run(script: string, period: ReportPeriod): Promise<TabularDataset>;
}

export interface PeriodReportResult {
  primary: TabularDataset;
  sheets: NamedSheet[];
  statistics: StatisticsResult;
  failures: SourceFailure[];
  warnings: string[];
}

export function validatePeriod(period: ReportPeriod): void {
  if (period.start.getTime() > period.end.getTime()) {
    throw new Error(
      `Data inicial (${formatDisplayDate(period.start)}) posterior à data final (${formatDisplayDate(period.end)})`
    );
  }
}

export async function runPeriodReport(
  definition: ReportDefinition,
  runner: QueryRunner,
  period: ReportPeriod
): Promise<PeriodReportResult> {
  validatePeriod(period);

  const failures: SourceFailure[] = [];
  const warnings: string[] = [];
  const sheets: NamedSheet[] = [];
  let primary: TabularDataset | null = null;

  for (const query of definition.queries) {
    const dataset = sanitizeColumns(await querySource(
      { name: query.sheetName, primary: query.primary },
      () => runner.run(query.script, period),
      (): TabularDataset => ({ columns: [], rows: [] }),
      failures
    ));

    if (query.primary && primary === null) {
      primary = dataset;
      if (dataset.rows.length === 0) {
        warnings.push(`A consulta principal retornou 0 linhas (planilha criada vazia na aba '${query.sheetName}').`);
      }
    } else if (dataset.rows.length === 0) {
      warnings.push(`Não há registros para a aba '${query.sheetName}' (aba não gerada).`);
    }

    sheets.push({ name: query.sheetName, dataset, primary: query.primary });
  }

  if (primary === null) {
    throw new Error(`Report "${definition.id}" has no primary query`);
  }

  const statistics = aggregateStatistics(primary, definition.statisticsColumn);
  if (statistics.warning) {
    warnings.push(statistics.warning);
  }
  sheets.push({
    name: definition.statisticsSheet,
    dataset: statisticsDataset(statistics.rows, definition.statisticsColumn),
  });

  return { primary, sheets, statistics, failures, warnings };
}
