export type CellValue = string | number | boolean | Date | null;

/** One uploaded or queried row, keyed by column name */
export type RawRow = Record<string, CellValue>;

/**
 * Rows plus an explicit column order. The order matters for the exports and
 * cannot be recovered from the row objects when there are no rows.
 */
export interface TabularDataset {
  columns: string[];
  rows: RawRow[];
}

/** Trimmed, non-empty key such as a matricula */
export type Identifier = string;

export type SourceName = string;

/**
 * Identifiers a source found, keyed by identifierKey, each with its auxiliary
 * attribute (null when the source supplies none for that identifier)
 */
export type SourceResultSet = Map<Identifier, string | null>;

export interface SourceSpec {
  name: SourceName;
  /** A failing primary source aborts the request; any other degrades to empty */
  primary: boolean;
  /** SQL file run against the staged batch */
  scriptPath: string;
  identifierColumn: string;
  attributeColumn?: string | null;
}

export interface SourceRecord {
  identifier: Identifier;
  attribute: string | null;
}

/** `label` is null for identifiers no source contains */
export interface ResolvedIdentifier {
  identifier: Identifier;
  label: string | null;
  sources: SourceName[];
  attribute: string | null;
}

export const ORIGIN_COLUMN = 'Origem';
export const ATTRIBUTE_COLUMN = 'Responsavel';
