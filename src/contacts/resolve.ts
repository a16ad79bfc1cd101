import type { ContactIndex, IdentifierMatch, Resolution } from '../types/index.js';

/**
 * Look up each identifier in order. Names are kept in first-match order and
 * appear once even when several identifiers belong to the same contact.
 */
export function resolveNames(identifiers: readonly string[], index: ContactIndex): Resolution {
  const names: string[] = [];
  const matches: IdentifierMatch[] = [];

  for (const identifier of identifiers) {
    const name = index.lookup(identifier);
    matches.push({ identifier, name });
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }

  return { names, matches };
}
