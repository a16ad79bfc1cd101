export type { ContactRecord, ContactIndex, ContactIndexStats } from './contact.js';
export type { Identifier, IdentifierKind, IdentifierMatch, Resolution } from './identifier.js';
export type { AccessStatus, ContactProvider } from './provider.js';
export type {
  DateRange,
  ExportFile,
  ExportFormat,
  PlannedRename,
  RenameSummary,
  TimestampSummary,
} from './export.js';
