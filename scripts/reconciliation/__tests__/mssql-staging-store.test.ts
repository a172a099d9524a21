import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as sql from 'mssql';
import {
  MssqlStagingStore,
  StagingPool,
  StagingRequest,
  stagingTableName,
  stagingWidth,
  toSourceRecords,
} from '../mssql-staging-store';
import { SourceSpec } from '../types';

type QueryResult = Awaited<ReturnType<StagingRequest['query']>>;

/**
 * Records every command; source queries answer from `results` and can be held
 * open until cancelled
 */
class FakePool implements StagingPool {
  readonly commands: string[] = [];
  readonly bulkTables: sql.Table[] = [];
  results: Array<Record<string, unknown>> = [];
  queryError: Error | null = null;
  bulkError: Error | null = null;
  holdQueries = false;
  cancelled = 0;

  request(): StagingRequest {
    let rejectHeld: ((error: Error) => void) | null = null;
    return {
      query: async (command: string) => {
        this.commands.push(command);
        if (!command.startsWith('SELECT')) return {};
        if (this.queryError) throw this.queryError;
        if (this.holdQueries) {
          return new Promise<QueryResult>((_resolve, reject) => {
            rejectHeld = reject;
          });
        }
        return { recordset: this.results };
      },
      bulk: async (table: sql.Table) => {
        this.commands.push('BULK');
        this.bulkTables.push(table);
        if (this.bulkError) throw this.bulkError;
        return { rowsAffected: table.rows.length };
      },
      cancel: () => {
        this.cancelled++;
        rejectHeld?.(new Error('Canceled.'));
      },
    };
  }

  kinds(): string[] {
    return this.commands.map(command => {
      if (command.startsWith('CREATE TABLE')) return 'create';
      if (command.startsWith('IF OBJECT_ID')) return 'drop';
      if (command === 'BULK') return 'bulk';
      return 'select';
    });
  }
}

describe('stagingTableName', () => {
  test('should build a global temp table name from the id', () => {
    expect(stagingTableName('0f8c-11aa-22bb')).toBe('##stg_identificador_0f8c11aa22bb');
  });

  test('should be unique per call', () => {
    expect(stagingTableName()).not.toBe(stagingTableName());
    expect(stagingTableName()).toMatch(/^##stg_identificador_[0-9a-f]{32}$/);
  });
});

describe('toSourceRecords', () => {
  const source: SourceSpec = {
    name: 'Bloqueado',
    primary: true,
    scriptPath: 'sources/matriculas-bloqueadas.sql',
    identifierColumn: 'Matricula',
    attributeColumn: 'Responsavel',
  };

  test('should read the configured columns and skip rows without identifier', () => {
    expect(toSourceRecords([
      { Matricula: ' 001 ', Responsavel: 'Gerencia A' },
      { Matricula: 2, Responsavel: '  ' },
      { Matricula: null, Responsavel: 'ignorado' },
    ], source)).toEqual([
      { identifier: '001', attribute: 'Gerencia A' },
      { identifier: '2', attribute: null },
    ]);
  });

  test('should leave the attribute empty when the source has none', () => {
    expect(toSourceRecords([{ Matricula: '001', Responsavel: 'x' }], { ...source, attributeColumn: null }))
      .toEqual([{ identifier: '001', attribute: null }]);
  });
});

describe('stagingWidth', () => {
  test('should never go below 50 characters', () => {
    expect(stagingWidth(['001'])).toBe(50);
    expect(stagingWidth([])).toBe(50);
    expect(stagingWidth(['x'.repeat(72), '1'])).toBe(72);
  });
});

describe('MssqlStagingStore', () => {
  let sqlDirectory: string;
  const source: SourceSpec = {
    name: 'Bloqueado',
    primary: true,
    scriptPath: 'sources/teste.sql',
    identifierColumn: 'Matricula',
    attributeColumn: 'Responsavel',
  };

  beforeEach(() => {
    sqlDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'staging-test-'));
    fs.mkdirSync(path.join(sqlDirectory, 'sources'));
    fs.writeFileSync(
      path.join(sqlDirectory, 'sources', 'teste.sql'),
      'SELECT stg.Identificador AS Matricula FROM $(STAGING_TABLE) AS stg'
    );
  });

  afterEach(() => {
    fs.rmSync(sqlDirectory, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test('should create, load, query and drop the staging table in order', async () => {
    const pool = new FakePool();
    pool.results = [{ Matricula: 'a123', Responsavel: 'Gerencia A' }];
    const store = new MssqlStagingStore(pool, sqlDirectory);

    const scope = await store.acquire(['a123', '002']);
    const records = await scope.fetch(source);
    await scope.release();

    expect(scope.name).toMatch(/^##stg_identificador_[0-9a-f]{32}$/);
    expect(pool.commands).toEqual([
      `CREATE TABLE ${scope.name} ([Identificador] NVARCHAR(50) NOT NULL PRIMARY KEY)`,
      'BULK',
      `SELECT stg.Identificador AS Matricula FROM ${scope.name} AS stg`,
      `IF OBJECT_ID('tempdb..${scope.name}') IS NOT NULL DROP TABLE ${scope.name}`,
    ]);
    expect(pool.bulkTables[0].create).toBe(false);
    expect(Array.from(pool.bulkTables[0].rows)).toEqual([['a123'], ['002']]);
    expect(records).toEqual([{ identifier: 'a123', attribute: 'Gerencia A' }]);
  });

  test('should stage a batch of hundreds of thousands of identifiers', async () => {
    const pool = new FakePool();
    const identifiers: string[] = [];
    for (let i = 0; i < 300000; i++) {
      identifiers.push(`M${i}`);
    }
    identifiers.push('L'.repeat(64));

    const scope = await new MssqlStagingStore(pool, sqlDirectory).acquire(identifiers);

    expect(pool.commands[0]).toBe(`CREATE TABLE ${scope.name} ([Identificador] NVARCHAR(64) NOT NULL PRIMARY KEY)`);
    expect(pool.bulkTables[0].rows).toHaveLength(300001);
  });

  test('should drop the table when the bulk load fails', async () => {
    const pool = new FakePool();
    pool.bulkError = new Error('Violation of PRIMARY KEY constraint');

    await expect(new MssqlStagingStore(pool, sqlDirectory).acquire(['001']))
      .rejects.toThrow('Violation of PRIMARY KEY constraint');
    expect(pool.kinds()).toEqual(['create', 'bulk', 'drop']);
  });

  test('should cancel the running query when the signal aborts', async () => {
    const pool = new FakePool();
    pool.holdQueries = true;
    const scope = await new MssqlStagingStore(pool, sqlDirectory).acquire(['001']);
    const controller = new AbortController();

    const pending = scope.fetch(source, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Canceled.');
    expect(pool.cancelled).toBe(1);
  });

  test('should stop listening to the signal once the query finished', async () => {
    const pool = new FakePool();
    const scope = await new MssqlStagingStore(pool, sqlDirectory).acquire(['001']);
    const controller = new AbortController();

    await scope.fetch(source, controller.signal);
    controller.abort();

    expect(pool.cancelled).toBe(0);
  });

  test('should not retry a source query after a connection error', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const pool = new FakePool();
    pool.queryError = Object.assign(new Error('Connection lost - read ECONNRESET'), { code: 'ESOCKET' });
    const scope = await new MssqlStagingStore(pool, sqlDirectory).acquire(['001']);

    await expect(scope.fetch(source)).rejects.toThrow('Connection lost');
    expect(pool.kinds()).toEqual(['create', 'bulk', 'select']);
  });
});
