import type { ContactIndex, ContactProvider, ContactRecord } from '../types/index.js';
import { AuthorizationError, describeError, logger } from '../utils/index.js';
import { buildContactIndex, EMPTY_CONTACT_INDEX } from './contact-index.js';

const SAMPLE_SIZE = 5;

/**
 * Ask the provider for access, then build the index from everything it
 * returns. Denial or a failed fetch leaves the index empty, which turns
 * renaming off without stopping the run.
 */
export async function loadContactIndex(provider: ContactProvider): Promise<ContactIndex> {
  const access = await provider.requestAccess();
  if (access !== 'granted') {
    logger.warn(new AuthorizationError(
      provider.name,
      'Contacts access not authorized. Grant access in System Settings → Privacy & Security → Contacts',
    ).message);
    return EMPTY_CONTACT_INDEX;
  }

  let records: ContactRecord[];
  try {
    records = await provider.fetchAll();
  } catch (err) {
    logger.error(`Error fetching contacts: ${describeError(err)}`);
    return EMPTY_CONTACT_INDEX;
  }

  const index = buildContactIndex(records);
  logger.debug(`Loaded ${index.stats.contacts} contacts`);
  logger.debug(`Mapped ${index.stats.phones} phone numbers`);
  logger.debug(`Mapped ${index.stats.emails} email addresses`);
  logger.debug(`Total contact identifiers: ${index.size}`);
  return index;
}

/** First few identifier → name pairs, for verbose output. */
export function sampleEntries(index: ContactIndex, count: number = SAMPLE_SIZE): [string, string][] {
  const sample: [string, string][] = [];
  for (const entry of index.entries()) {
    if (sample.length >= count) break;
    sample.push(entry);
  }
  return sample;
}
