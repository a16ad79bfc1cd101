import { describe, it, expect } from 'vitest';
import { loadContactIndex, sampleEntries } from '../../src/contacts/load.js';
import { FakeProvider, makeRecord } from '../helpers.js';

const records = [
  makeRecord({ givenName: 'Alice', phones: ['4155551234'] }),
  makeRecord({ givenName: 'Bob', emails: ['bob@example.com'] }),
];

describe('loadContactIndex', () => {
  it('should build the index once access is granted', async () => {
    const provider = new FakeProvider(records);
    const index = await loadContactIndex(provider);

    expect(provider.accessRequests).toBe(1);
    expect(index.size).toBe(4);
    expect(index.lookup('bob@example.com')).toBe('Bob');
  });

  it('should return an empty index without fetching when access is denied', async () => {
    const provider = new FakeProvider(records, 'denied');
    const index = await loadContactIndex(provider);

    expect(index.size).toBe(0);
    expect(provider.fetches).toBe(0);
  });

  it('should return an empty index when the fetch fails', async () => {
    const provider = new FakeProvider(records, 'granted', true);
    const index = await loadContactIndex(provider);

    expect(index.size).toBe(0);
    expect(provider.fetches).toBe(1);
  });
});

describe('sampleEntries', () => {
  it('should take entries in insertion order up to the limit', async () => {
    const index = await loadContactIndex(new FakeProvider(records));
    expect(sampleEntries(index, 2)).toEqual([
      ['+14155551234', 'Alice'],
      ['14155551234', 'Alice'],
    ]);
  });
});
