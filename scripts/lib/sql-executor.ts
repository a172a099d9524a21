import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';

/**
 * Read a SQL script from the sql directory
 */
export function readSqlScript(sqlDirectory: string, script: string): string {
  const scriptPath = path.resolve(sqlDirectory, script);
  if (!fs.existsSync(scriptPath)) {
    throw new Error(`SQL script not found: ${scriptPath}`);
  }
  return fs.readFileSync(scriptPath, 'utf-8');
}

/**
 * Replace $(NAME) placeholders. Unknown placeholders are an error rather than
 * being sent to the server as-is.
 */
export function substituteVariables(script: string, variables: Record<string, string>): string {
  return script.replace(/\$\(([A-Z_][A-Z0-9_]*)\)/g, (placeholder, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new Error(`No value for SQL placeholder ${placeholder}`);
    }
    return value;
  });
}

/**
 * Open a pool and check it answers before any report work starts
 */
export async function connectPool(config: sql.config): Promise<sql.ConnectionPool> {
  const pool = new sql.ConnectionPool(config);
  await pool.connect();
  try {
    await pool.request().query('SELECT 1 AS ok');
  } catch (error) {
    await pool.close();
    throw error;
  }
  return pool;
}
