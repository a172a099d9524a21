export interface DatasetQuery {
  sheetName: string;
  /** SQL file relative to the sql directory; binds @DataInicio and @DataFim */
  script: string;
  primary: boolean;
}

export interface ReportDefinition {
  id: string;
  title: string;
  fileNamePrefix: string;
  queries: DatasetQuery[];
  statisticsColumn: string;
  statisticsSheet: string;
}

export const REPORT_DEFINITIONS: Record<string, ReportDefinition> = {
  devolvidos: {
    id: 'devolvidos',
    title: 'Requerimentos devolvidos',
    fileNamePrefix: 'Requerimentos_devolvidos',
    queries: [
      { sheetName: 'Dados', script: 'reports/requerimentos-devolvidos.sql', primary: true },
      { sheetName: 'sem_numero_beneficio', script: 'reports/sem-numero-beneficio-devolvidos.sql', primary: false },
    ],
    statisticsColumn: 'Status',
    statisticsSheet: 'Estatistica',
  },
  deferidos: {
    id: 'deferidos',
    title: 'Requerimentos deferidos',
    fileNamePrefix: 'Relatorio_Requerimentos',
    queries: [
      { sheetName: 'Dados', script: 'reports/requerimentos-deferidos.sql', primary: true },
      { sheetName: 'Sem_Numero_Beneficio', script: 'reports/sem-numero-beneficio-deferidos.sql', primary: false },
    ],
    statisticsColumn: 'Status',
    statisticsSheet: 'Estatistica',
  },
};

export function getReportDefinition(id: string): ReportDefinition {
  const definition = REPORT_DEFINITIONS[id];
  if (!definition) {
    throw new Error(`Unknown report "${id}". Available: ${Object.keys(REPORT_DEFINITIONS).join(', ')}`);
  }
  return definition;
}
