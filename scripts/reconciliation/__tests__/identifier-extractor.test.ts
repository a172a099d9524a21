import { ColumnNotFoundError } from '../../lib/error-handler';
import {
  extractIdentifiers,
  findColumn,
  normalizeColumnName,
  normalizeIdentifier,
} from '../identifier-extractor';
import { TabularDataset } from '../types';

describe('normalizeColumnName', () => {
  test('should lowercase, strip accents and trim', () => {
    expect(normalizeColumnName(' Matrícula ')).toBe('matricula');
  });

  test('should collapse internal whitespace to one space', () => {
    expect(normalizeColumnName('Num   Matrícula')).toBe('num matricula');
  });
});

describe('findColumn', () => {
  test('should match an accented, padded header', () => {
    expect(findColumn(['Nome', ' Matrícula ', 'Plano'], ['matricula'])).toBe(' Matrícula ');
  });

  test('should fall back to ignoring internal spaces', () => {
    expect(findColumn(['Nome', 'Num Matricula'], ['nummatricula'])).toBe('Num Matricula');
  });

  test('should prefer an earlier candidate over a later one', () => {
    expect(findColumn(['num_matricula', 'MATRICULA'], ['matricula', 'num_matricula'])).toBe('MATRICULA');
  });

  test('should return null when nothing matches', () => {
    expect(findColumn(['Nome', 'Plano'], ['matricula'])).toBeNull();
  });
});

describe('normalizeIdentifier', () => {
  test('should trim values and stringify numbers', () => {
    expect(normalizeIdentifier('  001 ')).toBe('001');
    expect(normalizeIdentifier(1234)).toBe('1234');
  });

  test('should treat empty, nan and None as absent', () => {
    expect(normalizeIdentifier('')).toBeNull();
    expect(normalizeIdentifier('   ')).toBeNull();
    expect(normalizeIdentifier('nan')).toBeNull();
    expect(normalizeIdentifier('None')).toBeNull();
    expect(normalizeIdentifier(null)).toBeNull();
    expect(normalizeIdentifier(undefined)).toBeNull();
  });
});

describe('extractIdentifiers', () => {
  const table: TabularDataset = {
    columns: ['Nome', ' Matrícula '],
    rows: [
      { Nome: 'Ana', ' Matrícula ': ' 001 ' },
      { Nome: 'Bruno', ' Matrícula ': 'nan' },
      { Nome: 'Carla', ' Matrícula ': '002' },
      { Nome: 'Ana de novo', ' Matrícula ': '001' },
      { Nome: 'Davi', ' Matrícula ': null },
    ],
  };

  test('should extract trimmed identifiers in row order, keeping duplicates', () => {
    expect(extractIdentifiers(table, ['matricula'])).toEqual({
      status: 'extracted',
      column: ' Matrícula ',
      identifiers: ['001', '002', '001'],
    });
  });

  test('should report an empty result when no row has a value', () => {
    const empty: TabularDataset = {
      columns: ['Matricula'],
      rows: [{ Matricula: 'None' }, { Matricula: '' }],
    };
    expect(extractIdentifiers(empty, ['matricula'])).toEqual({ status: 'empty', column: 'Matricula' });
  });

  test('should report an empty result for an upload with no data rows', () => {
    expect(extractIdentifiers({ columns: ['Matricula'], rows: [] }, ['matricula']).status).toBe('empty');
  });

  test('should throw ColumnNotFoundError with the attempted names', () => {
    const call = () => extractIdentifiers({ columns: ['Nome'], rows: [] }, ['matricula']);
    expect(call).toThrow(ColumnNotFoundError);
    try {
      call();
    } catch (error) {
      expect(error).toBeInstanceOf(ColumnNotFoundError);
      if (error instanceof ColumnNotFoundError) {
        expect(error.attempted).toEqual(['matricula']);
        expect(error.available).toEqual(['Nome']);
      }
    }
  });
});
