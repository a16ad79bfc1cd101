import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { AccessStatus, ContactRecord } from '../types/index.js';
import { BaseProvider } from './base.js';
import { describeError, logger, ProviderError } from '../utils/index.js';

const execFileAsync = promisify(execFile);

const text = z.string().nullable().optional().transform(v => v ?? '');
const values = z.array(z.string().nullable()).nullable().optional()
  .transform(v => (v ?? []).filter((s): s is string => typeof s === 'string' && s.length > 0));

const rawContactsSchema = z.array(z.object({
  givenName: text,
  familyName: text,
  organizationName: text,
  phones: values,
  emails: values,
}));

// Bulk property reads: one Apple event per field instead of one per person.
const FETCH_SCRIPT = `
  const app = Application("Contacts");
  const people = app.people;
  const first = people.firstName();
  const last = people.lastName();
  const org = people.organization();
  const phones = people.phones.value();
  const emails = people.emails.value();
  JSON.stringify(first.map((f, i) => ({
    givenName: f,
    familyName: last[i],
    organizationName: org[i],
    phones: phones[i],
    emails: emails[i],
  })));
`;

// Touching the people collection is what raises the macOS privacy prompt.
const ACCESS_SCRIPT = 'Application("Contacts").people.length';

/**
 * Apple Contacts provider using JXA (JavaScript for Automation) via osascript.
 * Only works on macOS. Requires Contacts access permission.
 */
export class AppleContactsProvider extends BaseProvider {
  readonly name = 'apple';
  readonly type = 'apple' as const;

  async requestAccess(): Promise<AccessStatus> {
    if (process.platform !== 'darwin') {
      logger.debug('Apple Contacts is only available on macOS');
      return 'denied';
    }
    try {
      await this.runJxa(ACCESS_SCRIPT);
      return 'granted';
    } catch (err) {
      logger.debug('Contacts access check failed:', describeError(err));
      return 'denied';
    }
  }

  async fetchAll(): Promise<ContactRecord[]> {
    const output = await this.runJxa(FETCH_SCRIPT);
    let parsed: unknown;
    try {
      parsed = JSON.parse(output);
    } catch (err) {
      throw new ProviderError(this.name, `Unreadable contact list: ${describeError(err)}`);
    }

    const result = rawContactsSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProviderError(this.name, `Unexpected contact list shape: ${result.error.message}`);
    }
    return result.data;
  }

  private async runJxa(script: string): Promise<string> {
    try {
      const { stdout } = await execFileAsync('osascript', ['-l', 'JavaScript', '-e', script], {
        maxBuffer: 64 * 1024 * 1024,
      });
      return stdout.trim();
    } catch (err) {
      throw new ProviderError(this.name, `JXA error: ${describeError(err)}`);
    }
  }
}
