export { normalizeEmail, phoneVariants } from './normalize.js';
export {
  exportExtension,
  extractIdentifiers,
  isExportFile,
  isRenameCandidate,
  stripExtension,
  tokenizeFilename,
} from './tokenize.js';
export { buildContactIndex, displayName, EMPTY_CONTACT_INDEX } from './contact-index.js';
export { resolveNames } from './resolve.js';
export { parseVCardFile, splitVCards, vcardToRecord } from './vcard.js';
export { loadContactIndex, sampleEntries } from './load.js';
