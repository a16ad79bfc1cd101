import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ExportFile } from '../types/index.js';
import { exportExtension } from '../contacts/index.js';

/** Expand a leading "~" the way a shell would. */
export function resolveExportDir(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
  return path.resolve(dir);
}

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dir);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/** Names of every entry in the directory, in listing order. */
export async function listEntries(dir: string): Promise<string[]> {
  return fs.readdir(dir);
}

/** The .txt and .html files of an export, in listing order. */
export async function listExportFiles(dir: string): Promise<ExportFile[]> {
  const files: ExportFile[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const filename = entry.name;
    const extension = exportExtension(filename);
    if (extension && entry.isFile()) {
      files.push({ path: path.join(dir, filename), filename, extension });
    }
  }
  return files;
}
