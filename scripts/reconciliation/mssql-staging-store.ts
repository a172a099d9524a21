/**
 * SQL Server staging for identifier batches
 *
 * Each acquire() bulk-loads the batch into its own global temp table
 * (##stg_identificador_<uuid>), so concurrent reports never share staging and
 * every pooled connection can see it. Source scripts join against it through
 * the $(STAGING_TABLE) placeholder and return the staged Identificador, so
 * results come back in the spelling that was uploaded.
 *
 * The table lives as long as the pooled connection that created it. A lost
 * connection may take the table with it, so source queries are not retried on
 * connection errors: the source fails instead of silently matching nothing.
 */

import * as crypto from 'crypto';
import * as sql from 'mssql';
import { errorMessage, retryWithBackoff } from '../lib/error-handler';
import { readSqlScript, substituteVariables } from '../lib/sql-executor';
import { toCellValue } from './dataset';
import { StagingScope, StagingStore } from './source-query-adapter';
import { Identifier, SourceRecord, SourceSpec } from './types';

export const STAGING_COLUMN = 'Identificador';
const MIN_STAGING_WIDTH = 50;

/**
 * The parts of an mssql request the staging store uses
 */
export interface StagingRequest {
  query(command: string): Promise<{ recordset?: Array<Record<string, unknown>> }>;
  bulk(table: sql.Table): Promise<unknown>;
  cancel(): void;
}

/** Satisfied by sql.ConnectionPool */
export interface StagingPool {
  request(): StagingRequest;
}

export function stagingTableName(id: string = crypto.randomUUID()): string {
  return `##stg_identificador_${id.replace(/-/g, '')}`;
}

export function stagingWidth(identifiers: Identifier[]): number {
  return identifiers.reduce((widest, identifier) => Math.max(widest, identifier.length), MIN_STAGING_WIDTH);
}

function readString(value: unknown): string | null {
  const cell = toCellValue(value);
  if (cell === null) return null;
  const text = (cell instanceof Date ? cell.toISOString() : String(cell)).trim();
  return text === '' ? null : text;
}

/**
 * Map recordset rows to source records using the source's column names
 */
export function toSourceRecords(rows: Array<Record<string, unknown>>, source: SourceSpec): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (const row of rows) {
    const identifier = readString(row[source.identifierColumn]);
    if (identifier === null) continue;
    records.push({
      identifier,
      attribute: source.attributeColumn ? readString(row[source.attributeColumn]) : null,
    });
  }
  return records;
}

export class MssqlStagingStore implements StagingStore {
  private pool: StagingPool;
  private sqlDirectory: string;

  constructor(pool: StagingPool, sqlDirectory: string) {
    this.pool = pool;
    this.sqlDirectory = sqlDirectory;
  }

  async acquire(identifiers: Identifier[]): Promise<StagingScope> {
    const tableName = stagingTableName();
    const width = stagingWidth(identifiers);

    await this.pool.request().query(
      `CREATE TABLE ${tableName} ([${STAGING_COLUMN}] NVARCHAR(${width}) NOT NULL PRIMARY KEY)`
    );

    try {
      const table = new sql.Table(tableName);
      table.create = false;
      table.columns.add(STAGING_COLUMN, sql.NVarChar(width), { nullable: false });
      for (const identifier of identifiers) {
        table.rows.add(identifier);
      }
      await this.pool.request().bulk(table);
    } catch (error) {
      await this.drop(tableName).catch(dropError => {
        console.warn(`  ⚠️  Failed to drop staging ${tableName}: ${errorMessage(dropError)}`);
      });
      throw error;
    }

    return {
      name: tableName,
      fetch: (source, signal) => this.fetch(tableName, source, signal),
      release: () => this.drop(tableName),
    };
  }

  private async fetch(tableName: string, source: SourceSpec, signal?: AbortSignal): Promise<SourceRecord[]> {
    const script = substituteVariables(
      readSqlScript(this.sqlDirectory, source.scriptPath),
      { STAGING_TABLE: tableName }
    );

    const result = await retryWithBackoff(() => {
      const request = this.pool.request();
      const cancel = () => request.cancel();
      signal?.addEventListener('abort', cancel, { once: true });
      return request
        .query(script)
        .finally(() => signal?.removeEventListener('abort', cancel));
    }, {
      maxRetries: 3,
      baseDelay: 1000,
      shouldRetry: classification => classification.category !== 'connection',
      onRetry: attempt => {
        console.log(`    Retry attempt ${attempt} for source ${source.name}`);
      }
    });

    return toSourceRecords(result.recordset ?? [], source);
  }

  private async drop(tableName: string): Promise<void> {
    await this.pool.request().query(`IF OBJECT_ID('tempdb..${tableName}') IS NOT NULL DROP TABLE ${tableName}`);
  }
}
