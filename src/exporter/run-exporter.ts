import { spawn } from 'node:child_process';
import type { ExportConfig } from '../config.js';
import { describeError, hasErrorCode, logger, SubprocessError } from '../utils/index.js';

export interface ExporterResult {
  exitCode: number | null;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

export type ExporterRunner = (config: ExportConfig) => Promise<void>;

export function buildExporterArgs(config: ExportConfig): string[] {
  const args = [
    '-f', config.format,
    '-c', config.copyMethod,
    '-o', config.outputDirectory,
  ];
  if (config.databasePath) args.push('-p', config.databasePath);
  if (config.attachmentPath) args.push('-r', config.attachmentPath);
  if (config.startDate) args.push('-s', config.startDate);
  if (config.endDate) args.push('-e', config.endDate);
  return args;
}

/** Run a command to completion, buffering its combined output. */
export function runBuffered(command: string, args: string[]): Promise<ExporterResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const chunks: Buffer[] = [];

    child.stdout.on('data', (data: Buffer) => chunks.push(data));
    child.stderr.on('data', (data: Buffer) => chunks.push(data));
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ exitCode: code, output: Buffer.concat(chunks).toString('utf-8') });
    });
  });
}

/** Run the exporter once. Any failure to start it, or a non-zero exit, is fatal. */
export async function runExporter(config: ExportConfig): Promise<void> {
  const args = buildExporterArgs(config);
  logger.info('Running iMessage export...');
  logger.debug(`Running command: ${[config.exporterBin, ...args].join(' ')}`);

  let result: ExporterResult;
  try {
    result = await runBuffered(config.exporterBin, args);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new SubprocessError(
        `${config.exporterBin} not found. Install it from https://github.com/ReagentX/imessage-exporter and make sure it is on your PATH`,
      );
    }
    throw new SubprocessError(`Error running ${config.exporterBin}: ${describeError(err)}`);
  }

  if (result.output.trim()) {
    logger.info('iMessage Exporter output:');
    logger.info(result.output.trimEnd());
  }

  if (result.exitCode !== 0) {
    throw new SubprocessError(`iMessage export failed with exit code: ${result.exitCode}`, result.exitCode);
  }
  logger.info('✓ iMessage export completed successfully');
}
