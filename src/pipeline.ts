import type { ExportConfig } from './config.js';
import type { ContactProvider, RenameSummary, TimestampSummary } from './types/index.js';
import { loadContactIndex, sampleEntries } from './contacts/index.js';
import { DateExtractor } from './dates/index.js';
import { runExporter, type ExporterRunner } from './exporter/run-exporter.js';
import {
  directoryExists,
  renameExportFiles,
  resolveExportDir,
  updateExportTimestamps,
} from './files/index.js';
import { createProvider } from './providers/index.js';
import { logger } from './utils/index.js';

export interface RunDependencies {
  provider?: ContactProvider;
  exporter?: ExporterRunner;
  extractor?: DateExtractor;
}

export interface RunSummary {
  exported: boolean;
  contactIdentifiers: number;
  rename?: RenameSummary;
  timestamps?: TimestampSummary;
}

const RULE = '='.repeat(50);

function logConfiguration(config: ExportConfig): void {
  logger.debug('Configuration:');
  logger.debug(`  Output directory: ${config.outputDirectory}`);
  logger.debug(`  Format: ${config.format}`);
  logger.debug(`  Copy method: ${config.copyMethod}`);
  logger.debug(`  Database path: ${config.databasePath ?? 'default'}`);
  logger.debug(`  Attachment path: ${config.attachmentPath ?? 'default'}`);
  logger.debug(`  Start date: ${config.startDate ?? 'none'}`);
  logger.debug(`  End date: ${config.endDate ?? 'none'}`);
  logger.debug(`  Contacts: ${config.contactsFile ?? 'Apple Contacts'}`);
  logger.debug(`  Rename files: ${config.renameFiles}`);
  logger.debug('');
}

function logRenameSummary(summary: RenameSummary, dryRun: boolean): void {
  if (dryRun) {
    logger.info(`Would rename ${summary.renamed} files`);
    if (summary.unmatched > 0) logger.info(`${summary.unmatched} files had no matching contacts`);
  } else {
    logger.info(`Renamed ${summary.renamed} files`);
    if (summary.unmatched > 0) logger.debug(`${summary.unmatched} files had no matching contacts`);
  }
  if (summary.failed > 0) logger.warn(`${summary.failed} files could not be renamed`);
}

function logTimestampSummary(summary: TimestampSummary, dryRun: boolean): void {
  logger.info(dryRun
    ? `Would update timestamps for ${summary.updated} files`
    : `✅ Updated timestamps for ${summary.updated} files`);
  if (summary.noDates > 0) logger.debug(`${summary.noDates} files had no recognizable dates`);
  if (summary.failed > 0) logger.warn(`${summary.failed} files could not be stamped`);
}

/**
 * Export, rename and stamp, in that order. Fatal errors (a bad date pattern,
 * a failed export) propagate; everything else is logged, counted and skipped.
 */
export async function runPipeline(config: ExportConfig, deps: RunDependencies = {}): Promise<RunSummary> {
  // Built first so an unusable pattern stops the run before anything is exported.
  const extractor = deps.extractor ?? new DateExtractor();
  const exportDir = resolveExportDir(config.outputDirectory);
  const summary: RunSummary = { exported: false, contactIdentifiers: 0 };

  logger.info('🚀 iMessage Export & Rename');
  logger.info(RULE);
  if (config.dryRun) {
    logger.info('⚠️  DRY RUN MODE - No files will be created or modified\n');
  }
  logConfiguration(config);

  if (config.dryRun) {
    logger.info('🔍 DRY RUN: Would run iMessage export with current settings');
  } else if (config.skipExport) {
    logger.info('Skipping export, processing existing files');
  } else {
    await (deps.exporter ?? runExporter)(config);
    summary.exported = true;
  }

  const haveDir = await directoryExists(exportDir);
  if (!haveDir) {
    logger.error(`Export directory not found: ${config.outputDirectory}`);
  }

  if (config.renameFiles) {
    logger.info(`\n${RULE}`);
    logger.info('📇 Loading contacts and renaming files...');

    const index = await loadContactIndex(deps.provider ?? createProvider(config.contactsFile));
    summary.contactIdentifiers = index.size;

    if (index.size === 0) {
      logger.warn('No contacts found or contacts access denied. Files will keep original names.');
    } else {
      logger.debug('\nSample contacts loaded:');
      for (const [identifier, name] of sampleEntries(index)) {
        logger.debug(`  ${identifier} -> ${name}`);
      }
      if (index.size > 5) logger.debug(`  ... and ${index.size - 5} more`);

      if (haveDir) {
        summary.rename = await renameExportFiles(exportDir, index, { dryRun: config.dryRun });
        logRenameSummary(summary.rename, config.dryRun);
      }
    }
  } else {
    logger.info('📝 Skipping file renaming (--no-rename specified)');
  }

  logger.info(`\n${RULE}`);
  logger.info(config.dryRun
    ? '🔍 DRY RUN: Checking file timestamps against message dates...'
    : '📅 Updating file timestamps based on message dates...');

  if (haveDir) {
    summary.timestamps = await updateExportTimestamps(exportDir, extractor, { dryRun: config.dryRun });
    logTimestampSummary(summary.timestamps, config.dryRun);
  }

  logger.info(`\n${RULE}`);
  if (config.dryRun) {
    logger.info('✅ Dry run completed. Run without --dry-run to export and rename files.');
  } else {
    logger.info('✅ Export and rename completed!');
    logger.info(`📁 Files available at: ${config.outputDirectory}`);
  }

  return summary;
}
