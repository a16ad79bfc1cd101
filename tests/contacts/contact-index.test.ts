import { describe, it, expect } from 'vitest';
import { buildContactIndex, displayName } from '../../src/contacts/contact-index.js';
import { makeRecord } from '../helpers.js';

describe('displayName', () => {
  it('should join given and family names', () => {
    expect(displayName(makeRecord({ givenName: 'Jane', familyName: 'Doe' }))).toBe('Jane Doe');
  });

  it('should use whichever name part is present', () => {
    expect(displayName(makeRecord({ familyName: 'Doe' }))).toBe('Doe');
  });

  it('should fall back to the organization', () => {
    expect(displayName(makeRecord({ organizationName: 'Acme Corp' }))).toBe('Acme Corp');
  });

  it('should be empty when nothing is set', () => {
    expect(displayName(makeRecord({ phones: ['4155551234'] }))).toBe('');
  });
});

describe('buildContactIndex', () => {
  it('should register every phone variant and lowercased email', () => {
    const index = buildContactIndex([
      makeRecord({ givenName: 'Jane', familyName: 'Doe', phones: ['(415) 555-1234'], emails: ['Jane@Example.com'] }),
    ]);

    expect(index.lookup('+14155551234')).toBe('Jane Doe');
    expect(index.lookup('14155551234')).toBe('Jane Doe');
    expect(index.lookup('4155551234')).toBe('Jane Doe');
    expect(index.lookup('(415) 555-1234')).toBe('Jane Doe');
    expect(index.lookup('jane@example.com')).toBe('Jane Doe');
    expect(index.lookup('Jane@Example.com')).toBeUndefined();
    expect(index.size).toBe(5);
  });

  it('should skip records without any name', () => {
    const index = buildContactIndex([makeRecord({ phones: ['4155551234'] })]);
    expect(index.size).toBe(0);
    expect(index.stats).toEqual({ contacts: 1, phones: 0, emails: 0 });
  });

  it('should let the last registration win', () => {
    const index = buildContactIndex([
      makeRecord({ givenName: 'First', phones: ['4155551234'] }),
      makeRecord({ givenName: 'Second', phones: ['+14155551234'] }),
    ]);
    expect(index.lookup('4155551234')).toBe('Second');
  });

  it('should count registered keys', () => {
    const index = buildContactIndex([
      makeRecord({ givenName: 'Jane', phones: ['4155551234'], emails: ['a@x.com', 'b@x.com'] }),
      makeRecord({ organizationName: 'Acme', phones: ['+442079460958'] }),
    ]);
    expect(index.stats).toEqual({ contacts: 2, phones: 4, emails: 2 });
  });

  it('should be immutable', () => {
    const index = buildContactIndex([makeRecord({ givenName: 'Jane', emails: ['j@x.com'] })]);
    expect(Object.isFrozen(index)).toBe(true);
    expect(Object.isFrozen(index.stats)).toBe(true);
  });
});
