import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ArgumentError, describeError, hasErrorCode } from './utils/index.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD');
const nonEmpty = z.string().min(1, 'Must not be empty');

export const exportConfigSchema = z.object({
  outputDirectory: nonEmpty,
  format: z.enum(['txt', 'html']),
  copyMethod: z.enum(['disabled', 'clone', 'basic', 'full']),
  databasePath: nonEmpty.optional(),
  attachmentPath: nonEmpty.optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
  contactsFile: nonEmpty.optional(),
  exporterBin: nonEmpty,
  skipExport: z.boolean(),
  renameFiles: z.boolean(),
  dryRun: z.boolean(),
  verbose: z.boolean(),
});

export type ExportConfig = z.infer<typeof exportConfigSchema>;

/** Settings a config file may provide; per-run switches stay on the command line. */
const fileConfigSchema = exportConfigSchema.pick({
  outputDirectory: true,
  format: true,
  copyMethod: true,
  databasePath: true,
  attachmentPath: true,
  contactsFile: true,
  exporterBin: true,
}).partial().strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export const DEFAULT_CONFIG: ExportConfig = {
  outputDirectory: './imessage_export',
  format: 'txt',
  copyMethod: 'disabled',
  exporterBin: 'imessage-exporter',
  skipExport: false,
  renameFiles: true,
  dryRun: false,
  verbose: false,
};

/** How each setting is spelled on the command line, for error messages. */
const FLAG_NAMES: Record<keyof ExportConfig, string> = {
  outputDirectory: '--output',
  format: '--format',
  copyMethod: '--copy-method',
  databasePath: '--db-path',
  attachmentPath: '--attachment-root',
  startDate: '--start-date',
  endDate: '--end-date',
  contactsFile: '--contacts',
  exporterBin: 'exporterBin',
  skipExport: '--skip-export',
  renameFiles: '--no-rename',
  dryRun: '--dry-run',
  verbose: '--verbose',
};

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CHAT_EXPORT_TIDY_CONFIG
    ?? path.join(os.homedir(), '.chat-export-tidy', 'config.json');
}

function formatIssues(error: z.ZodError, source: string): string {
  return error.issues.map(issue => {
    const flags: Record<string, string | undefined> = FLAG_NAMES;
    const key = issue.path[0];
    const label = (typeof key === 'string' ? flags[key] : undefined)
      ?? (issue.path.join('.') || source);
    return `${label}: ${issue.message}`;
  }).join('; ');
}

/** Read the optional JSON config file. A missing file means no overrides. */
export async function readConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return {};
    throw new ArgumentError(`Cannot read config file ${configPath}: ${describeError(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ArgumentError(`Config file ${configPath} is not valid JSON: ${describeError(err)}`);
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ArgumentError(`Config file ${configPath}: ${formatIssues(result.error, configPath)}`);
  }
  return result.data;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<ExportConfig> {
  const overrides: Partial<ExportConfig> = {};
  if (env.CHAT_EXPORT_TIDY_OUTPUT) overrides.outputDirectory = env.CHAT_EXPORT_TIDY_OUTPUT;
  if (env.IMESSAGE_EXPORTER_BIN) overrides.exporterBin = env.IMESSAGE_EXPORTER_BIN;
  return overrides;
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

/**
 * Defaults, then the config file, then the environment, then the command
 * line. The merged result is validated as a whole.
 */
export async function loadConfig(
  cli: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<ExportConfig> {
  const fromFile = await readConfigFile(defaultConfigPath(env));

  const merged = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...envOverrides(env),
    ...definedOnly(cli),
  };

  const result = exportConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ArgumentError(formatIssues(result.error, 'configuration'));
  }
  return result.data;
}
