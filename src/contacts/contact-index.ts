import type { ContactIndex, ContactIndexStats, ContactRecord } from '../types/index.js';
import { phoneVariants } from './normalize.js';

/** Given + family name, falling back to the organization. Empty when neither is set. */
export function displayName(record: ContactRecord): string {
  const parts = [record.givenName, record.familyName].filter(p => p.length > 0);
  if (parts.length > 0) return parts.join(' ');
  return record.organizationName;
}

class ImmutableContactIndex implements ContactIndex {
  private readonly map: ReadonlyMap<string, string>;
  readonly stats: Readonly<ContactIndexStats>;

  constructor(map: Map<string, string>, stats: ContactIndexStats) {
    this.map = map;
    this.stats = Object.freeze({ ...stats });
    Object.freeze(this);
  }

  get size(): number {
    return this.map.size;
  }

  lookup(identifier: string): string | undefined {
    return this.map.get(identifier);
  }

  entries(): IterableIterator<[string, string]> {
    return this.map.entries();
  }
}

/**
 * Build the identifier → display name lookup. A key registered by more than
 * one contact maps to the last one seen.
 */
export function buildContactIndex(records: Iterable<ContactRecord>): ContactIndex {
  const map = new Map<string, string>();
  const stats: ContactIndexStats = { contacts: 0, phones: 0, emails: 0 };

  for (const record of records) {
    stats.contacts++;
    const name = displayName(record);
    if (!name) continue;

    for (const phone of record.phones) {
      for (const variant of phoneVariants(phone)) {
        map.set(variant, name);
        stats.phones++;
      }
    }

    for (const email of record.emails) {
      map.set(email.toLowerCase(), name);
      stats.emails++;
    }
  }

  return new ImmutableContactIndex(map, stats);
}

export const EMPTY_CONTACT_INDEX: ContactIndex = buildContactIndex([]);
