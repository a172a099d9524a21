/**
 * Matricula Reconciliation
 * ========================
 * Checks every matricula of an uploaded spreadsheet against the configured
 * sources (blocked, liminar, ...) and writes two workbooks: the full upload
 * with Origem/Responsavel columns, and only the rows that matched.
 *
 * Usage:
 *   npx tsx scripts/run-reconciliation.ts --file <path> [options]
 *
 * Options:
 *   --sheet <name>    Workbook sheet to read (default: first sheet)
 *   --list-sheets     Print the workbook's sheets and exit
 *   --column <name>   Identifier column (default: reconciliation.identifierColumns)
 *   --anchor <name>   Column after which Origem/Responsavel are inserted
 *                     (default: the identifier column)
 *   --print-config    Print the resolved configuration (password masked)
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';
import { hasFlag, readOption } from './lib/cli-args';
import { getSqlConfig, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { errorMessage, formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { connectPool } from './lib/sql-executor';
import { buildReportFileName, packageWorkbook, writeArtifacts } from './reconciliation/export-packager';
import { extractIdentifiers } from './reconciliation/identifier-extractor';
import { MssqlStagingStore } from './reconciliation/mssql-staging-store';
import { reconcileUpload, reconciliationSheets, toSourceSpecs } from './reconciliation/reconcile';
import { listSheets, readUpload } from './reconciliation/upload-reader';

dotenv.config();

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const reporter = new ProgressReporter();

  const filePath = readOption(args, '--file');
  if (!filePath) {
    console.error('❌ Informe o arquivo: --file <caminho.xlsx|caminho.csv>');
    process.exit(1);
  }

  if (hasFlag(args, '--list-sheets')) {
    listSheets(fs.readFileSync(filePath)).forEach(name => console.log(name));
    return;
  }

  const config = loadConfig();
  if (hasFlag(args, '--print-config')) {
    printConfig(config);
  }

  const column = readOption(args, '--column');
  const identifierColumns = column ? [column] : config.reconciliation.identifierColumns;
  const anchorColumn = readOption(args, '--anchor') ?? config.reconciliation.anchorColumn;
  const sources = toSourceSpecs(config.reconciliation.sources);

  reporter.logRunStart('Conciliação de matrículas', {
    'Arquivo': filePath,
    'Fontes': sources.map(source => source.name).join(', '),
  });

  const table = readUpload(filePath, { sheet: readOption(args, '--sheet') });
  reporter.logDataset('upload', table.rows.length, table.columns.length);

  // Nothing to reconcile: stop before touching the database
  const extraction = extractIdentifiers(table, identifierColumns);
  if (extraction.status === 'empty') {
    reporter.logWarning(`Nenhuma matrícula encontrada na coluna '${extraction.column}'. Nada a processar.`);
    return;
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Erro nas variáveis de ambiente:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    process.exit(1);
  }

  let pool: sql.ConnectionPool | null = null;

  try {
    reporter.logStep('Conectando ao banco de dados', 1, 3);
    pool = await connectPool(getSqlConfig(config));

    reporter.logStep('Consultando fontes', 2, 3);
    const started = Date.now();
    const outcome = await reconcileUpload(table, new MssqlStagingStore(pool, config.paths.sqlDirectory), {
      identifierColumns,
      anchorColumn,
      sources,
      bothLabel: config.reconciliation.bothLabel,
    });
    if (outcome.status === 'empty') {
      reporter.logWarning('Nenhuma matrícula a processar.');
      return;
    }
    reporter.logStepComplete('Conciliação', (Date.now() - started) / 1000, outcome.identifierCount);

    for (const failure of outcome.failures) {
      reporter.logWarning(`Fonte '${failure.source}' indisponível, tratada como vazia: ${errorMessage(failure.error)}`);
    }
    if (outcome.anchorColumn === null) {
      reporter.logWarning(`Coluna '${anchorColumn ?? ''}' não encontrada; Origem/Responsavel adicionadas ao final.`);
    }
    if (outcome.statistics.warning) {
      reporter.logWarning(outcome.statistics.warning);
    }
    reporter.logTable('Resumo por Origem', outcome.statistics.rows.map(row => [row.value, row.count]));

    reporter.logStep('Gerando Excel', 3, 3);
    const sheets = reconciliationSheets(outcome.report, outcome.statistics);
    const baseName = path.parse(filePath).name;
    // Both workbooks are serialized before either is written
    const fullContent = packageWorkbook(sheets.full);
    const matchesContent = packageWorkbook(sheets.matchesOnly);
    const saved = writeArtifacts(config.paths.outputDirectory, [
      { fileName: buildReportFileName(`${baseName}_completo`), content: fullContent },
      { fileName: buildReportFileName(`${baseName}_encontrados`), content: matchesContent },
    ]);
    reporter.logDataset('completo', outcome.report.full.rows.length, outcome.report.full.columns.length);
    reporter.logDataset('encontrados', outcome.report.matchesOnly.rows.length, outcome.report.matchesOnly.columns.length);

    reporter.logRunComplete(saved);
  } catch (error) {
    reporter.logRunFailure(error instanceof Error ? error : new Error(String(error)));
    console.error(formatError(error));
    process.exitCode = 1;
  } finally {
    if (pool) {
      await pool.close();
    }
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exit(1);
});
