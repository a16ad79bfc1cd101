import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ContactIndex, RenameSummary } from '../types/index.js';
import { extractIdentifiers, isRenameCandidate, resolveNames } from '../contacts/index.js';
import { describeError, logger, RenameError } from '../utils/index.js';
import { DirectoryView, defaultCaseInsensitive } from './directory-view.js';
import { listEntries } from './export-dir.js';
import { sanitizeFilename } from './sanitize.js';

export interface RenameOptions {
  dryRun?: boolean;
  caseInsensitive?: boolean;
}

/**
 * Pick a free filename for `baseName`. A name already taken by another file
 * gets " (1)", " (2)", ... appended; a name equal to `current` is kept, so
 * renaming an already renamed file is a no-op.
 */
export function chooseTargetName(
  baseName: string,
  extension: string,
  current: string,
  view: DirectoryView,
): string {
  const withExt = (stem: string) => (extension ? `${stem}.${extension}` : stem);
  let candidate = withExt(baseName);
  let counter = 1;
  while (view.has(candidate) && candidate !== current) {
    candidate = withExt(`${baseName} (${counter})`);
    counter++;
  }
  return candidate;
}

/** Target filename for a set of matched contact names, before collision handling. */
export function targetBaseName(names: readonly string[]): string {
  return sanitizeFilename(names.join(', '));
}

/**
 * Rename every export file whose name carries phone numbers or addresses to
 * the names of the matching contacts. Files are processed in directory
 * listing order; a failed move is logged and counted, and the pass goes on.
 * An unreadable directory counts as one failure and ends the pass.
 */
export async function renameExportFiles(
  dir: string,
  index: ContactIndex,
  options: RenameOptions = {},
): Promise<RenameSummary> {
  const dryRun = options.dryRun ?? false;
  const summary: RenameSummary = { renamed: 0, unmatched: 0, unchanged: 0, failed: 0, renames: [] };

  let entries: string[];
  try {
    entries = await listEntries(dir);
  } catch (err) {
    summary.failed++;
    logger.error(`Error reading export directory: ${describeError(err)}`);
    return summary;
  }

  const view = new DirectoryView(entries, options.caseInsensitive ?? defaultCaseInsensitive());
  const candidates = entries.filter(isRenameCandidate);

  logger.debug(`Found ${candidates.length} files to potentially rename`);

  for (const filename of candidates) {
    const identifiers = extractIdentifiers(filename);
    const { names, matches } = resolveNames(identifiers, index);

    logger.debug(`Processing file: ${filename}`);
    logger.debug(`  Extracted identifiers: ${identifiers.join(', ')}`);
    for (const match of matches) {
      logger.debug(match.name
        ? `  ✓ Matched: ${match.identifier} -> ${match.name}`
        : `  ✗ No match for: ${match.identifier}`);
    }

    const baseName = targetBaseName(names);
    if (!baseName) {
      summary.unmatched++;
      logger.debug(`No matching contacts found for: ${filename}`);
      continue;
    }

    const extension = path.extname(filename).slice(1);
    const target = chooseTargetName(baseName, extension, filename, view);

    if (target === filename) {
      summary.unchanged++;
      continue;
    }

    if (dryRun) {
      logger.info(`[DRY RUN] Renaming:\n  From: ${filename}\n  To:   ${target}`);
    } else {
      logger.debug(`Renaming:\n  From: ${filename}\n  To:   ${target}`);
      try {
        await fs.rename(path.join(dir, filename), path.join(dir, target));
      } catch (err) {
        summary.failed++;
        logger.error(new RenameError(filename, target, err).message);
        continue;
      }
    }

    view.move(filename, target);
    summary.renamed++;
    summary.renames.push({ from: filename, to: target });
  }

  return summary;
}
