/**
 * Period Report
 * =============
 * Extracts benefit requests for a date range into a multi-sheet workbook
 * (Dados, requests without a benefit number, Estatistica by Status).
 *
 * Usage:
 *   npx tsx scripts/run-period-report.ts [options]
 *
 * Options:
 *   --report <id>     devolvidos (default) or deferidos
 *   --inicio <data>   Start date, dd/mm/aaaa or mm-dd-aaaa (prompted if missing)
 *   --fim <data>      End date, inclusive (prompted if missing)
 *   --print-config    Print the resolved configuration (password masked)
 *
 * Connection comes from $SQLSERVER or SQLSERVER_HOST/DATABASE/USER/PASSWORD,
 * optionally from a .env file.
 */

import * as dotenv from 'dotenv';
import * as readline from 'readline';
import * as sql from 'mssql';
import { hasFlag, readOption } from './lib/cli-args';
import { getSqlConfig, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { formatDisplayDate, parseDateInput, promptDate } from './lib/date-input';
import { errorMessage, formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { connectPool } from './lib/sql-executor';
import { buildReportFileName, packageWorkbook, writeArtifact } from './reconciliation/export-packager';
import { MssqlQueryRunner } from './reports/mssql-query-runner';
import { runPeriodReport, ReportPeriod } from './reports/period-report';
import { getReportDefinition } from './reports/report-definitions';

dotenv.config();

async function readPeriod(args: string[]): Promise<ReportPeriod> {
  const given = {
    start: readOption(args, '--inicio'),
    end: readOption(args, '--fim'),
  };
  const start = given.start === undefined ? null : parseDateInput(given.start);
  const end = given.end === undefined ? null : parseDateInput(given.end);

  if (given.start !== undefined && start === null) {
    throw new Error(`Data inicial inválida: "${given.start}". Use dd/mm/aaaa ou mm-dd-aaaa.`);
  }
  if (given.end !== undefined && end === null) {
    throw new Error(`Data final inválida: "${given.end}". Use dd/mm/aaaa ou mm-dd-aaaa.`);
  }
  if (start !== null && end !== null) {
    return { start, end };
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return {
      start: start ?? await promptDate(rl, 'Informe a data inicial (dd/mm/aaaa ou mm-dd-aaaa): '),
      end: end ?? await promptDate(rl, 'Informe a data final (dd/mm/aaaa ou mm-dd-aaaa): '),
    };
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const reporter = new ProgressReporter();

  const config = loadConfig();
  if (hasFlag(args, '--print-config')) {
    printConfig(config);
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Erro nas variáveis de ambiente:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    process.exit(1);
  }

  const definition = getReportDefinition(readOption(args, '--report') ?? 'devolvidos');
  const period = await readPeriod(args);

  reporter.logRunStart(definition.title, {
    'Período': `${formatDisplayDate(period.start)} a ${formatDisplayDate(period.end)}`,
    'Saída': config.paths.outputDirectory,
  });

  let pool: sql.ConnectionPool | null = null;

  try {
    reporter.logStep('Conectando ao banco de dados', 1, 4);
    pool = await connectPool(getSqlConfig(config));
    reporter.logInfo('Conexão bem-sucedida.');

    reporter.logStep('Executando consultas', 2, 4);
    const started = Date.now();
    const result = await runPeriodReport(definition, new MssqlQueryRunner(pool, config.paths.sqlDirectory), period);
    reporter.logStepComplete('Consultas', (Date.now() - started) / 1000, result.primary.rows.length);

    for (const failure of result.failures) {
      reporter.logWarning(`Erro ao executar a consulta '${failure.source}': ${errorMessage(failure.error)}`);
    }
    for (const warning of result.warnings) {
      reporter.logWarning(warning);
    }
    reporter.logTable(
      `Resumo por ${definition.statisticsColumn}`,
      result.statistics.rows.map(row => [row.value, row.count])
    );

    reporter.logStep('Gerando Excel', 3, 4);
    const content = packageWorkbook(result.sheets);
    for (const sheet of result.sheets) {
      if (sheet.primary || sheet.dataset.rows.length > 0) {
        reporter.logDataset(sheet.name, sheet.dataset.rows.length, sheet.dataset.columns.length);
      }
    }

    reporter.logStep('Salvando arquivo', 4, 4);
    const filePath = writeArtifact(
      config.paths.outputDirectory,
      buildReportFileName(definition.fileNamePrefix),
      content
    );

    reporter.logRunComplete([filePath]);
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
