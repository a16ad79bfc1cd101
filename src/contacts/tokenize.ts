import * as path from 'node:path';
import type { ExportFormat, Identifier } from '../types/index.js';
import { normalizeEmail, phoneVariants } from './normalize.js';

/** Filename without its last extension. */
export function stripExtension(filename: string): string {
  const ext = path.extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}

/**
 * Split an export filename into the identifiers it names. The exporter joins
 * conversation participants with commas; parts that are neither a phone
 * number nor an email (a name already in place, for instance) are dropped.
 */
export function tokenizeFilename(filename: string): Identifier[] {
  const parts = stripExtension(filename).split(',').map(p => p.trim());
  const identifiers: Identifier[] = [];

  for (const part of parts) {
    if (/\d/.test(part)) {
      identifiers.push({ kind: 'phone', source: part, values: phoneVariants(part) });
    } else if (part.includes('@')) {
      identifiers.push({ kind: 'email', source: part, values: [normalizeEmail(part)] });
    }
  }

  return identifiers;
}

/** Flattened lookup keys for a filename, in part order then variant order. */
export function extractIdentifiers(filename: string): string[] {
  return tokenizeFilename(filename).flatMap(id => id.values);
}

export function exportExtension(filename: string): ExportFormat | undefined {
  const ext = path.extname(filename).slice(1).toLowerCase();
  if (ext === 'txt' || ext === 'html') return ext;
  return undefined;
}

export function isExportFile(filename: string): boolean {
  return exportExtension(filename) !== undefined;
}

/** Export files whose name still carries a number or an address. */
export function isRenameCandidate(filename: string): boolean {
  return isExportFile(filename) && /[\d@]/.test(filename);
}
