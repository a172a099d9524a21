import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';

export interface SourceConfig {
  name: string;
  script: string;            // relative to paths.sqlDirectory
  primary: boolean;
  identifierColumn: string;
  attributeColumn?: string | null;
}

export interface ReportConfig {
  database: {
    connectionString: string;
  };
  paths: {
    outputDirectory: string;   // 'Arquivos'
    sqlDirectory: string;
  };
  reconciliation: {
    identifierColumns: string[];
    anchorColumn: string | null;
    bothLabel: string;
    sources: SourceConfig[];
  };
}

interface AppSettingsFile {
  database?: Partial<ReportConfig['database']>;
  paths?: Partial<ReportConfig['paths']>;
  reconciliation?: Partial<ReportConfig['reconciliation']>;
}

const DEFAULT_SOURCES: SourceConfig[] = [
  {
    name: 'Bloqueado',
    script: 'sources/matriculas-bloqueadas.sql',
    primary: true,
    identifierColumn: 'Matricula',
    attributeColumn: 'Responsavel',
  },
  {
    name: 'Liminar',
    script: 'sources/matriculas-liminar.sql',
    primary: false,
    identifierColumn: 'Matricula',
    attributeColumn: 'Responsavel',
  },
];

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
export function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  // "Server=host,1433" is the ADO.NET way of giving the port
  let server = parts['server'] || parts['data source'];
  let port = parts['port'] ? parseInt(parts['port'], 10) : undefined;
  if (server && server.includes(',')) {
    const [host, serverPort] = server.split(',');
    server = host.trim();
    port = port ?? parseInt(serverPort, 10);
  }

  return {
    server,
    port: port !== undefined && !Number.isNaN(port) ? port : undefined,
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function readAppSettings(cwd: string): AppSettingsFile {
  const configPath = path.join(cwd, 'appsettings.json');
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const fileContent = fs.readFileSync(configPath, 'utf-8');
    return JSON.parse(fileContent);
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse appsettings.json: ${error}`);
    return {};
  }
}

/**
 * Load report configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Overrides (passed as parameter)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(
  overrides?: Partial<ReportConfig>,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ReportConfig {
  const fileConfig = readAppSettings(cwd);

  let connectionString = env.SQLSERVER || '';

  if (!connectionString && (env.SQLSERVER_HOST || env.SQLSERVER_DATABASE)) {
    const server = env.SQLSERVER_HOST;
    const database = env.SQLSERVER_DATABASE;
    const user = env.SQLSERVER_USER;
    const password = env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      connectionString = `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  // Extra pairs come last so they win over the defaults above
  const extra = (env.SQLSERVER_EXTRA || '').trim();
  if (connectionString && extra) {
    connectionString += extra.endsWith(';') ? extra : `${extra};`;
  }

  const fileSqlDirectory = fileConfig.paths?.sqlDirectory;
  const config: ReportConfig = {
    database: {
      connectionString: connectionString || fileConfig.database?.connectionString || '',
    },
    paths: {
      outputDirectory: env.REPORT_OUTPUT_DIR || fileConfig.paths?.outputDirectory || 'Arquivos',
      sqlDirectory: env.SQL_DIR
        || (fileSqlDirectory ? path.resolve(cwd, fileSqlDirectory) : path.join(cwd, 'sql')),
    },
    reconciliation: {
      identifierColumns: fileConfig.reconciliation?.identifierColumns || ['matricula'],
      anchorColumn: fileConfig.reconciliation?.anchorColumn ?? null,
      bothLabel: fileConfig.reconciliation?.bothLabel || 'Ambos',
      sources: fileConfig.reconciliation?.sources || DEFAULT_SOURCES,
    },
  };

  if (overrides) {
    if (overrides.database?.connectionString) {
      config.database.connectionString = overrides.database.connectionString;
    }
    if (overrides.paths) {
      Object.assign(config.paths, overrides.paths);
    }
    if (overrides.reconciliation) {
      Object.assign(config.reconciliation, overrides.reconciliation);
    }
  }

  return config;
}

/**
 * Convert report config to mssql config
 */
export function getSqlConfig(config: ReportConfig): sql.config {
  if (!config.database.connectionString) {
    throw new Error('Database connection string is required');
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new Error('Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;');
  }

  return {
    server: parsed.server,
    port: parsed.port,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
    pool: {
      max: 5,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ReportConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required (SQLSERVER or SQLSERVER_HOST/DATABASE/USER/PASSWORD)');
  } else {
    const parsed = parseConnectionString(config.database.connectionString);
    const missing = [
      ['server', parsed.server],
      ['database', parsed.database],
      ['user', parsed.user],
      ['password', parsed.password],
    ].filter(([, value]) => !value).map(([name]) => name);
    if (missing.length > 0) {
      errors.push(`Connection string is missing: ${missing.join(', ')}`);
    }
  }

  if (!config.paths.outputDirectory) errors.push('Output directory is required');
  if (config.reconciliation.identifierColumns.length === 0) {
    errors.push('At least one identifier column name is required');
  }

  const names = new Set<string>();
  for (const source of config.reconciliation.sources) {
    if (!source.name) errors.push('Every reconciliation source needs a name');
    if (!source.script) errors.push(`Source "${source.name}" has no script`);
    if (names.has(source.name)) errors.push(`Duplicate source name "${source.name}"`);
    names.add(source.name);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/(Password|Pwd)=[^;]+/gi, '$1=***');
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: ReportConfig): void {
  const masked: ReportConfig = {
    ...config,
    database: { connectionString: maskConnectionString(config.database.connectionString) },
  };

  console.log('\n📋 Report Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(masked, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}
