/**
 * Error handling for the report jobs
 * Domain errors, SQL Server error classification and retry logic for transient failures
 */

/**
 * The identifier (or another required) column is not in the upload after
 * every normalization pass.
 */
export class ColumnNotFoundError extends Error {
  readonly attempted: string[];
  readonly available: string[];

  constructor(attempted: string[], available: string[]) {
    super(`Column not found: tried ${attempted.map(name => `"${name}"`).join(', ')} among [${available.join(', ')}]`);
    this.name = 'ColumnNotFoundError';
    this.attempted = attempted;
    this.available = available;
  }
}

/**
 * A named source query failed. Only raised for the primary source;
 * secondary sources degrade to an empty result set.
 */
export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    super(`Source "${source}" unavailable: ${errorMessage(cause)}`, { cause });
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

export class ExportFailureError extends Error {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${errorMessage(cause)}`, { cause });
    this.name = 'ExportFailureError';
  }
}

export class UploadFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadFormatError';
  }
}

export interface ErrorClassification {
  isTransient: boolean;
  category: 'connection' | 'timeout' | 'deadlock' | 'constraint' | 'syntax' | 'unknown';
  message: string;
  suggestion: string;
}

interface ErrorDetails {
  message: string;
  code?: string | number;
  number?: number;
  lineNumber?: number;
  procName?: string;
  stack?: string;
}

function readDetails(error: unknown): ErrorDetails {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const details: ErrorDetails = {
    message: 'message' in error && typeof error.message === 'string' ? error.message : String(error),
  };
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    details.code = error.code;
  }
  if ('number' in error && typeof error.number === 'number') details.number = error.number;
  if ('lineNumber' in error && typeof error.lineNumber === 'number') details.lineNumber = error.lineNumber;
  if ('procName' in error && typeof error.procName === 'string') details.procName = error.procName;
  if ('stack' in error && typeof error.stack === 'string') details.stack = error.stack;
  return details;
}

export function errorMessage(error: unknown): string {
  return readDetails(error).message;
}

/**
 * Classify an error to determine if it's transient
 */
export function classifyError(error: unknown): ErrorClassification {
  const { message, code: errorCode, number } = readDetails(error);
  const code = errorCode ?? number;

  // SQL Server connection errors (transient)
  if (
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      isTransient: true,
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  // SQL Server timeout errors (transient)
  if (
    code === -2 ||
    code === 'ETIMEOUT' ||
    message.includes('Timeout') ||
    message.includes('timeout')
  ) {
    return {
      isTransient: true,
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider narrowing the date range or increasing requestTimeout'
    };
  }

  if (
    code === 1205 || // Deadlock victim
    message.includes('deadlock')
  ) {
    return {
      isTransient: true,
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Retrying query'
    };
  }

  if (
    code === 547 ||
    code === 2627 ||
    code === 2601 ||
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      isTransient: false,
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check for duplicate identifiers in the staged batch'
    };
  }

  if (
    code === 102 || // Syntax error
    code === 156 || // Incorrect syntax
    code === 208 || // Invalid object name
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name')
  ) {
    return {
      isTransient: false,
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Fix the SQL script or verify the database schema'
    };
  }

  return {
    isTransient: false,
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelay?: number; // milliseconds
    maxDelay?: number; // milliseconds
    onRetry?: (attempt: number, error: unknown) => void;
    /** Narrows which transient errors are retried */
    shouldRetry?: (classification: ErrorClassification) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry,
    shouldRetry = () => true
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const classification = classifyError(error);

      if (!classification.isTransient || !shouldRetry(classification) || attempt >= maxRetries) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      console.log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      console.log(`     ${classification.suggestion}`);
      console.log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);
  const details = readDetails(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  if (error instanceof Error) {
    formatted += `  Type:        ${error.name}\n`;
  }
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (details.code !== undefined) {
    formatted += `  Error Code:  ${details.code}\n`;
  }

  if (details.number !== undefined) {
    formatted += `  SQL Number:  ${details.number}\n`;
  }

  if (details.lineNumber !== undefined) {
    formatted += `  Line:        ${details.lineNumber}\n`;
  }

  if (details.procName) {
    formatted += `  Procedure:   ${details.procName}\n`;
  }

  if (error instanceof SourceUnavailableError || error instanceof ExportFailureError) {
    formatted += `  Cause:       ${errorMessage(error.cause)}\n`;
  }

  formatted += `\n  Stack Trace:\n`;
  formatted += `  ${(details.stack || '').split('\n').join('\n  ')}\n`;

  return formatted;
}
