import type { ContactProvider } from '../types/index.js';
import { AppleContactsProvider } from './apple.js';
import { VCardFileProvider } from './vcard-file.js';

export { BaseProvider } from './base.js';
export { AppleContactsProvider } from './apple.js';
export { VCardFileProvider } from './vcard-file.js';

/** A .vcf file when one is given, the system address book otherwise. */
export function createProvider(contactsFile?: string): ContactProvider {
  return contactsFile ? new VCardFileProvider(contactsFile) : new AppleContactsProvider();
}
