import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AccessStatus, ContactProvider, ContactRecord } from '../src/types/index.js';

/** Create a temp export directory holding the given files. */
export async function createExportDir(
  files: Record<string, string> = {},
): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chat-export-tidy-test-'));
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, 'utf-8');
  }
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

export async function listNames(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

/** Build a contact record for testing. */
export function makeRecord(overrides: Partial<ContactRecord>): ContactRecord {
  return {
    givenName: overrides.givenName ?? '',
    familyName: overrides.familyName ?? '',
    organizationName: overrides.organizationName ?? '',
    phones: overrides.phones ?? [],
    emails: overrides.emails ?? [],
  };
}

/** In-memory contact store. */
export class FakeProvider implements ContactProvider {
  readonly name = 'fake';
  readonly type = 'vcard' as const;
  accessRequests = 0;
  fetches = 0;
  private records: ContactRecord[];
  private access: AccessStatus;
  private failFetch: boolean;

  constructor(records: ContactRecord[], access: AccessStatus = 'granted', failFetch = false) {
    this.records = records;
    this.access = access;
    this.failFetch = failFetch;
  }

  async requestAccess(): Promise<AccessStatus> {
    this.accessRequests++;
    return this.access;
  }

  async fetchAll(): Promise<ContactRecord[]> {
    this.fetches++;
    if (this.failFetch) throw new Error('store unavailable');
    return this.records;
  }
}

export const TXT_CONVERSATION = [
  'Nov 28, 2024 11:46:34 AM',
  '+14155551234',
  'Are we still on for lunch?',
  '',
  'Nov 29, 2024  2:19:59 PM',
  'Me',
  'Yes, see you at noon',
  '',
].join('\n');
