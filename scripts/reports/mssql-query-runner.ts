import * as sql from 'mssql';
import { retryWithBackoff } from '../lib/error-handler';
import { readSqlScript } from '../lib/sql-executor';
import { toCellValue } from '../reconciliation/dataset';
import { RawRow, TabularDataset } from '../reconciliation/types';
import { QueryRunner, ReportPeriod } from './period-report';

/**
 * Just the parts of an mssql recordset the conversion reads
 */
export interface RecordsetLike extends Array<Record<string, unknown>> {
  columns?: Record<string, { index: number; name: string }>;
}

/**
 * Column order comes from the recordset metadata, so an empty result still
 * yields its header
 */
export function recordsetToDataset(recordset: RecordsetLike | undefined): TabularDataset {
  if (!recordset) {
    return { columns: [], rows: [] };
  }

  const columns = recordset.columns
    ? Object.values(recordset.columns).sort((a, b) => a.index - b.index).map(column => column.name)
    : Object.keys(recordset[0] ?? {});

  const rows = recordset.map(record => {
    const row: RawRow = {};
    for (const column of columns) {
      row[column] = toCellValue(record[column]);
    }
    return row;
  });

  return { columns, rows };
}

export class MssqlQueryRunner implements QueryRunner {
  private pool: sql.ConnectionPool;
  private sqlDirectory: string;

  constructor(pool: sql.ConnectionPool, sqlDirectory: string) {
    this.pool = pool;
    this.sqlDirectory = sqlDirectory;
  }

  async run(script: string, period: ReportPeriod): Promise<TabularDataset> {
    const queryText = readSqlScript(this.sqlDirectory, script);

    const result = await retryWithBackoff(
      () => this.pool.request()
        .input('DataInicio', sql.Date, period.start)
        .input('DataFim', sql.Date, period.end)
        .query(queryText),
      {
        maxRetries: 3,
        baseDelay: 1000,
        onRetry: attempt => {
          console.log(`    Retry attempt ${attempt} for ${script}`);
        }
      }
    );

    return recordsetToDataset(result.recordset);
  }
}
