export { sanitizeFilename } from './sanitize.js';
export { DirectoryView, defaultCaseInsensitive } from './directory-view.js';
export { directoryExists, listEntries, listExportFiles, resolveExportDir } from './export-dir.js';
export { chooseTargetName, renameExportFiles, targetBaseName, type RenameOptions } from './renamer.js';
export { applyDateRange, updateExportTimestamps, type TimestampOptions } from './timestamps.js';
