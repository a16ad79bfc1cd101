import type { ContactRecord } from './contact.js';

export type AccessStatus = 'granted' | 'denied';

export interface ContactProvider {
  readonly name: string;
  readonly type: 'apple' | 'vcard';

  /** Ask for access once; resolves when the store has answered. */
  requestAccess(): Promise<AccessStatus>;
  fetchAll(): Promise<ContactRecord[]>;
}
