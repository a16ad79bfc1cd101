import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, loadConfig, readConfigFile } from '../src/config.js';
import { ArgumentError } from '../src/utils/index.js';

let tmpDir: string;
let env: NodeJS.ProcessEnv;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chat-export-tidy-config-'));
  env = { CHAT_EXPORT_TIDY_CONFIG: path.join(tmpDir, 'config.json') };
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<void> {
  await fs.writeFile(path.join(tmpDir, 'config.json'), content, 'utf-8');
}

describe('loadConfig', () => {
  it('should use defaults without a config file', async () => {
    expect(await loadConfig({}, env)).toEqual(DEFAULT_CONFIG);
  });

  it('should ignore unset command-line values', async () => {
    const config = await loadConfig({ format: 'html', outputDirectory: undefined }, env);
    expect(config.format).toBe('html');
    expect(config.outputDirectory).toBe('./imessage_export');
  });

  it('should layer file, environment and command line', async () => {
    await writeConfig(JSON.stringify({ format: 'html', outputDirectory: '/from/file', copyMethod: 'basic' }));

    const config = await loadConfig(
      { copyMethod: 'full' },
      { ...env, CHAT_EXPORT_TIDY_OUTPUT: '/from/env' },
    );

    expect(config.format).toBe('html');
    expect(config.outputDirectory).toBe('/from/env');
    expect(config.copyMethod).toBe('full');
  });

  it('should take the exporter binary from the environment', async () => {
    const config = await loadConfig({}, { ...env, IMESSAGE_EXPORTER_BIN: '/opt/bin/imessage-exporter' });
    expect(config.exporterBin).toBe('/opt/bin/imessage-exporter');
  });

  it('should reject an unknown format', async () => {
    await expect(loadConfig({ format: 'pdf' }, env)).rejects.toThrow(/^--format: /);
  });

  it('should reject an unknown copy method', async () => {
    await expect(loadConfig({ copyMethod: 'rsync' }, env)).rejects.toBeInstanceOf(ArgumentError);
  });

  it('should reject malformed dates', async () => {
    await expect(loadConfig({ startDate: '2023/01/01' }, env))
      .rejects.toThrow('--start-date: Expected a date as YYYY-MM-DD');
  });
});

describe('readConfigFile', () => {
  it('should treat a missing file as empty', async () => {
    expect(await readConfigFile(path.join(tmpDir, 'missing.json'))).toEqual({});
  });

  it('should reject invalid JSON', async () => {
    await writeConfig('{ not json');
    await expect(readConfigFile(path.join(tmpDir, 'config.json'))).rejects.toBeInstanceOf(ArgumentError);
  });

  it('should reject unknown keys', async () => {
    await writeConfig(JSON.stringify({ dryRun: true }));
    await expect(readConfigFile(path.join(tmpDir, 'config.json'))).rejects.toBeInstanceOf(ArgumentError);
  });
});
