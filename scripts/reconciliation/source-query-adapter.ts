/**
 * Source Query Adapter
 *
 * Stages a batch of identifiers once, asks every source which of them it
 * knows about, and always tears the staging down again. Sources run one after
 * the other against the same staged batch.
 */

import { errorMessage, SourceUnavailableError } from '../lib/error-handler';
import { identifierKey, normalizeIdentifier } from './identifier-extractor';
import {
  Identifier,
  SourceName,
  SourceRecord,
  SourceResultSet,
  SourceSpec,
} from './types';

/**
 * A batch staged in the backing store, valid until released
 */
export interface StagingScope {
  readonly name: string;
  fetch(source: SourceSpec, signal?: AbortSignal): Promise<SourceRecord[]>;
  release(): Promise<void>;
}

export interface StagingStore {
  /** Stage the distinct identifiers under a name unique to this call */
  acquire(identifiers: Identifier[]): Promise<StagingScope>;
}

export interface SourceFailure {
  source: SourceName;
  error: unknown;
}

export interface BatchResolution {
  resultSets: Map<SourceName, SourceResultSet>;
  failures: SourceFailure[];
}

/**
 * Run one source query under the primary/secondary policy: the primary source
 * throws SourceUnavailableError, any other source records the failure and
 * falls back to `empty()`.
 */
export async function querySource<T>(
  source: { name: SourceName; primary: boolean },
  run: () => Promise<T>,
  empty: () => T,
  failures: SourceFailure[],
  signal?: AbortSignal
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    // a cancelled request is not a source failure
    if (signal?.aborted) {
      throw error;
    }
    if (source.primary) {
      throw new SourceUnavailableError(source.name, error);
    }
    failures.push({ source: source.name, error });
    return empty();
  }
}

/**
 * Fold source rows into a result set keyed by identifierKey. The first non-null
 * attribute seen for an identifier wins.
 */
export function toResultSet(records: SourceRecord[]): SourceResultSet {
  const resultSet: SourceResultSet = new Map();
  for (const record of records) {
    const identifier = normalizeIdentifier(record.identifier);
    if (identifier === null) continue;

    const key = identifierKey(identifier);
    const current = resultSet.get(key);
    if (current === undefined || current === null) {
      resultSet.set(key, record.attribute);
    }
  }
  return resultSet;
}

/**
 * One identifier per matching key, first spelling kept
 */
function distinctByKey(identifiers: Iterable<Identifier>): Identifier[] {
  const seen = new Set<string>();
  const batch: Identifier[] = [];
  for (const identifier of identifiers) {
    const key = identifierKey(identifier);
    if (seen.has(key)) continue;
    seen.add(key);
    batch.push(identifier);
  }
  return batch;
}

export async function resolveBatch(
  identifiers: Iterable<Identifier>,
  sources: SourceSpec[],
  store: StagingStore,
  options: { signal?: AbortSignal } = {}
): Promise<BatchResolution> {
  const { signal } = options;
  const batch = distinctByKey(identifiers);
  const resultSets = new Map<SourceName, SourceResultSet>();
  const failures: SourceFailure[] = [];

  if (batch.length === 0) {
    for (const source of sources) {
      resultSets.set(source.name, new Map());
    }
    return { resultSets, failures };
  }

  signal?.throwIfAborted();
  const scope = await store.acquire(batch);
  try {
    for (const source of sources) {
      signal?.throwIfAborted();
      const records = await querySource(
        source,
        () => scope.fetch(source, signal),
        (): SourceRecord[] => [],
        failures,
        signal
      );
      resultSets.set(source.name, toResultSet(records));
    }
  } catch (error) {
    // keep the original error; a failed release is only reported
    await scope.release().catch(releaseError => {
      console.warn(`  ⚠️  Failed to release staging ${scope.name}: ${errorMessage(releaseError)}`);
    });
    throw error;
  }
  await scope.release();

  return { resultSets, failures };
}
