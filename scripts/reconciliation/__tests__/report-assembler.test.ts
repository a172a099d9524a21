import { assembleReport, planColumns } from '../report-assembler';
import { ResolvedIdentifier, TabularDataset } from '../types';

function resolved(entries: ResolvedIdentifier[]): Map<string, ResolvedIdentifier> {
  return new Map(entries.map(entry => [entry.identifier, entry]));
}

describe('planColumns', () => {
  test('should insert the derived columns right after the anchor', () => {
    expect(planColumns(['Nome', 'Matricula', 'Cidade'], 'Matricula')).toEqual({
      columns: ['Nome', 'Matricula', 'Origem', 'Responsavel', 'Cidade'],
      originColumn: 'Origem',
      attributeColumn: 'Responsavel',
    });
  });

  test('should append the derived columns when the anchor is missing', () => {
    expect(planColumns(['Nome', 'Matricula'], 'Plano').columns).toEqual(['Nome', 'Matricula', 'Origem', 'Responsavel']);
    expect(planColumns(['Nome', 'Matricula'], null).columns).toEqual(['Nome', 'Matricula', 'Origem', 'Responsavel']);
  });

  test('should suffix derived names that collide with upload columns', () => {
    const plan = planColumns(['Matricula', 'Origem', 'Origem.1', 'Responsavel'], 'Matricula');
    expect(plan.columns).toEqual(['Matricula', 'Origem.2', 'Responsavel.1', 'Origem', 'Origem.1', 'Responsavel']);
    expect(plan.originColumn).toBe('Origem.2');
    expect(plan.attributeColumn).toBe('Responsavel.1');
  });
});

describe('assembleReport', () => {
  const table: TabularDataset = {
    columns: ['Matricula', 'Nome'],
    rows: [
      { Matricula: '001', Nome: 'Ana' },
      { Matricula: null, Nome: 'Sem matricula' },
      { Matricula: '003', Nome: 'Caio' },
      { Matricula: ' 002 ', Nome: 'Bia' },
      { Matricula: '001', Nome: 'Ana de novo' },
    ],
  };

  const memberships = resolved([
    { identifier: '001', label: 'Bloqueado', sources: ['Bloqueado'], attribute: 'X' },
    { identifier: '002', label: 'Ambos', sources: ['Bloqueado', 'Liminar'], attribute: null },
    { identifier: '003', label: null, sources: [], attribute: null },
  ]);

  test('should keep every row in order and label it', () => {
    const report = assembleReport(table, 'Matricula', memberships, 'Matricula');

    expect(report.full.columns).toEqual(['Matricula', 'Origem', 'Responsavel', 'Nome']);
    expect(report.full.rows).toEqual([
      { Matricula: '001', Origem: 'Bloqueado', Responsavel: 'X', Nome: 'Ana' },
      { Matricula: null, Origem: null, Responsavel: null, Nome: 'Sem matricula' },
      { Matricula: '003', Origem: null, Responsavel: null, Nome: 'Caio' },
      { Matricula: ' 002 ', Origem: 'Ambos', Responsavel: null, Nome: 'Bia' },
      { Matricula: '001', Origem: 'Bloqueado', Responsavel: 'X', Nome: 'Ana de novo' },
    ]);
  });

  test('should keep only labelled rows in the matches-only report', () => {
    const report = assembleReport(table, 'Matricula', memberships, 'Matricula');

    expect(report.matchesOnly.columns).toEqual(report.full.columns);
    expect(report.matchesOnly.rows.map(row => row.Nome)).toEqual(['Ana', 'Bia', 'Ana de novo']);
  });

  test('should report the suffixed origin column name', () => {
    const withOrigin: TabularDataset = {
      columns: ['Matricula', 'Origem'],
      rows: [{ Matricula: '001', Origem: 'planilha' }],
    };
    const report = assembleReport(withOrigin, 'Matricula', memberships, null);

    expect(report.originColumn).toBe('Origem.1');
    expect(report.full.rows).toEqual([
      { Matricula: '001', Origem: 'planilha', 'Origem.1': 'Bloqueado', Responsavel: 'X' },
    ]);
  });

  test('should produce empty reports for an empty table', () => {
    const report = assembleReport({ columns: ['Matricula'], rows: [] }, 'Matricula', new Map(), 'Matricula');
    expect(report.full).toEqual({ columns: ['Matricula', 'Origem', 'Responsavel'], rows: [] });
    expect(report.matchesOnly.rows).toEqual([]);
  });
});
