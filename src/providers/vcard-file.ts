import * as fs from 'node:fs/promises';
import type { AccessStatus, ContactRecord } from '../types/index.js';
import { BaseProvider } from './base.js';
import { parseVCardFile } from '../contacts/index.js';
import { describeError, ProviderError } from '../utils/index.js';

/**
 * Contacts read from an exported .vcf file. Useful off macOS, or to rename
 * against an address book other than the local one.
 */
export class VCardFileProvider extends BaseProvider {
  readonly name = 'vcard';
  readonly type = 'vcard' as const;

  constructor(filePath: string) {
    super({ path: filePath });
  }

  async requestAccess(): Promise<AccessStatus> {
    try {
      await fs.access(this.assertConfigured('path'), fs.constants.R_OK);
      return 'granted';
    } catch {
      return 'denied';
    }
  }

  async fetchAll(): Promise<ContactRecord[]> {
    const filePath = this.assertConfigured('path');
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return parseVCardFile(raw);
    } catch (err) {
      throw new ProviderError(this.name, `Cannot read ${filePath}: ${describeError(err)}`);
    }
  }
}
