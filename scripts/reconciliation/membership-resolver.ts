/**
 * Membership Resolver
 *
 * Reduces an identifier's presence across the source result sets to one
 * provenance label. Two or more sources give `bothLabel`, exactly one gives
 * that source's name, none gives null. The rule is the same for any number of
 * sources: the label never lists which sources matched, `sources` does.
 */

import { identifierKey } from './identifier-extractor';
import { Identifier, ResolvedIdentifier, SourceName, SourceResultSet } from './types';

export interface ResolveOptions {
  bothLabel?: string;
}

export const DEFAULT_BOTH_LABEL = 'Ambos';

export function resolveMemberships(
  identifiers: Iterable<Identifier>,
  resultSets: Map<SourceName, SourceResultSet>,
  precedence: SourceName[],
  options: ResolveOptions = {}
): Map<Identifier, ResolvedIdentifier> {
  const bothLabel = options.bothLabel ?? DEFAULT_BOTH_LABEL;
  const resolved = new Map<Identifier, ResolvedIdentifier>();

  for (const identifier of identifiers) {
    if (resolved.has(identifier)) continue;

    const key = identifierKey(identifier);
    const sources: SourceName[] = [];
    let attribute: string | null = null;

    for (const name of precedence) {
      const resultSet = resultSets.get(name);
      if (!resultSet || !resultSet.has(key)) continue;

      sources.push(name);
      const value = resultSet.get(key) ?? null;
      if (attribute === null && value !== null) {
        attribute = value;
      }
    }

    let label: string | null = null;
    if (sources.length >= 2) {
      label = bothLabel;
    } else if (sources.length === 1) {
      label = sources[0];
    }

    resolved.set(identifier, { identifier, label, sources, attribute });
  }

  return resolved;
}
