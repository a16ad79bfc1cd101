import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import type { DateRange, ExportFile, TimestampSummary } from '../types/index.js';
import { toDateRange, type DateExtractor } from '../dates/index.js';
import { describeError, logger, StampError } from '../utils/index.js';
import { listExportFiles } from './export-dir.js';

export interface TimestampOptions {
  dryRun?: boolean;
}

/**
 * Stamp a file with its conversation's time span: created at the first
 * message, modified at the last. Node can only write atime and mtime, so the
 * first write moves mtime to the first message; APFS and HFS+ pull the birth
 * time back to match. The second write sets the real modification time.
 *
 * If the second write fails, atime and mtime are put back as they were. A
 * birth time already pulled back by the first write stays.
 */
export async function applyDateRange(filePath: string, range: DateRange): Promise<void> {
  let before: Stats;
  try {
    before = await fs.stat(filePath);
    await fs.utimes(filePath, range.first, range.first);
  } catch (err) {
    throw new StampError(filePath, err);
  }

  try {
    await fs.utimes(filePath, range.last, range.last);
  } catch (err) {
    try {
      await fs.utimes(filePath, before.atime, before.mtime);
    } catch (restoreErr) {
      logger.warn(`Could not restore times of ${filePath}: ${describeError(restoreErr)}`);
    }
    throw new StampError(filePath, err);
  }
}

function formatDate(date: Date): string {
  return date.toLocaleString('en-US', { dateStyle: 'medium', timeStyle: 'short' });
}

export async function updateExportTimestamps(
  dir: string,
  extractor: DateExtractor,
  options: TimestampOptions = {},
): Promise<TimestampSummary> {
  const summary: TimestampSummary = { updated: 0, noDates: 0, failed: 0 };

  let files: ExportFile[];
  try {
    files = await listExportFiles(dir);
  } catch (err) {
    summary.failed++;
    logger.error(`Error reading export directory: ${describeError(err)}`);
    return summary;
  }

  logger.debug(`Found ${files.length} export files to process`);

  for (const file of files) {
    logger.debug(`Processing ${file.filename}...`);

    let content: string;
    try {
      content = await fs.readFile(file.path, 'utf-8');
    } catch (err) {
      summary.failed++;
      logger.error(`Error reading ${file.filename}: ${describeError(err)}`);
      continue;
    }

    const samples = extractor.samples(content, file.extension);
    logger.debug(`    Found ${samples.length} timestamps`);

    const range = toDateRange(samples);
    if (!range) {
      summary.noDates++;
      logger.debug(`  ⚠️  No dates found in ${file.filename}`);
      continue;
    }

    if (options.dryRun) {
      summary.updated++;
      logger.debug(`  [DRY RUN] Would stamp ${file.filename}: ${formatDate(range.first)} → ${formatDate(range.last)}`);
      continue;
    }

    try {
      await applyDateRange(file.path, range);
      summary.updated++;
      logger.debug(`  ✅ Updated ${file.filename}:`);
      logger.debug(`    Created: ${formatDate(range.first)}`);
      logger.debug(`    Modified: ${formatDate(range.last)}`);
    } catch (err) {
      summary.failed++;
      logger.error(describeError(err));
    }
  }

  return summary;
}
