import {
  classifyError,
  ColumnNotFoundError,
  ExportFailureError,
  formatError,
  retryWithBackoff,
  SourceUnavailableError,
} from '../error-handler';

describe('domain errors', () => {
  test('should describe the columns tried', () => {
    const error = new ColumnNotFoundError(['matricula', 'num_matricula'], ['Nome', 'CPF']);
    expect(error.message).toBe('Column not found: tried "matricula", "num_matricula" among [Nome, CPF]');
    expect(error.attempted).toEqual(['matricula', 'num_matricula']);
    expect(error.name).toBe('ColumnNotFoundError');
  });

  test('should keep the cause of source and export failures', () => {
    const cause = new Error('login failed');
    const source = new SourceUnavailableError('Bloqueado', cause);
    expect(source.message).toBe('Source "Bloqueado" unavailable: login failed');
    expect(source.source).toBe('Bloqueado');
    expect(source.cause).toBe(cause);

    const exportFailure = new ExportFailureError('Failed to save relatorio.xlsx', 'disk full');
    expect(exportFailure.message).toBe('Failed to save relatorio.xlsx: disk full');
  });
});

describe('classifyError', () => {
  test('should treat connection, timeout and deadlock errors as transient', () => {
    expect(classifyError({ code: 'ECONNRESET', message: 'read ECONNRESET' })).toMatchObject({ isTransient: true, category: 'connection' });
    expect(classifyError({ code: 'ETIMEOUT', message: 'Request failed' })).toMatchObject({ isTransient: true, category: 'timeout' });
    expect(classifyError({ number: 1205, message: 'chosen as the deadlock victim' })).toMatchObject({ isTransient: true, category: 'deadlock' });
  });

  test('should treat schema and constraint errors as permanent', () => {
    expect(classifyError({ number: 208, message: "Invalid object name 'CS_REQUERIMENTO'." })).toMatchObject({ isTransient: false, category: 'syntax' });
    expect(classifyError({ number: 2627, message: 'Violation of PRIMARY KEY constraint' })).toMatchObject({ isTransient: false, category: 'constraint' });
  });

  test('should keep the message of anything else', () => {
    expect(classifyError(new Error('boom'))).toEqual({
      isTransient: false,
      category: 'unknown',
      message: 'boom',
      suggestion: 'Review error details and logs',
    });
    expect(classifyError('plain text').message).toBe('plain text');
  });
});

describe('retryWithBackoff', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should not retry permanent errors', async () => {
    const fn = jest.fn(() => Promise.reject(new Error('Incorrect syntax near FROM')));
    await expect(retryWithBackoff(fn, { baseDelay: 1 })).rejects.toThrow('Incorrect syntax near FROM');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('should retry transient errors until the call succeeds', async () => {
    let calls = 0;
    const onRetry = jest.fn();
    const result = await retryWithBackoff(async () => {
      calls++;
      if (calls === 1) {
        throw Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
      }
      return 'ok';
    }, { baseDelay: 1, onRetry });

    expect(result).toBe('ok');
    expect(calls).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  test('should stop at transient errors the caller does not want retried', async () => {
    const fn = jest.fn(() => Promise.reject(Object.assign(new Error('Connection lost'), { code: 'ESOCKET' })));
    const shouldRetry = jest.fn((classification: { category: string }) => classification.category !== 'connection');

    await expect(retryWithBackoff(fn, { baseDelay: 1, shouldRetry })).rejects.toThrow('Connection lost');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledTimes(1);
  });

  test('should give up after the last attempt', async () => {
    const fn = jest.fn(() => Promise.reject(Object.assign(new Error('Timeout: Request failed'), { code: 'ETIMEOUT' })));
    await expect(retryWithBackoff(fn, { maxRetries: 2, baseDelay: 1 })).rejects.toThrow('Timeout: Request failed');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('formatError', () => {
  test('should include the error type, classification and cause', () => {
    const formatted = formatError(new SourceUnavailableError('Bloqueado', new Error('login failed')));

    expect(formatted).toContain('  Type:        SourceUnavailableError\n');
    expect(formatted).toContain('  Category:    unknown\n');
    expect(formatted).toContain('  Cause:       login failed\n');
  });

  test('should include SQL Server details when present', () => {
    const formatted = formatError({ number: 208, lineNumber: 12, message: "Invalid object name 'X'." });

    expect(formatted).toContain('  SQL Number:  208\n');
    expect(formatted).toContain('  Line:        12\n');
    expect(formatted).not.toContain('Type:');
  });
});
