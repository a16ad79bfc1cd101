import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { loadConfig } from './config.js';
import { runPipeline, type RunDependencies } from './pipeline.js';
import { ArgumentError, describeError, isFatal, logger, setVerbose } from './utils/index.js';

type CliOptions = {
  output?: string;
  format?: string;
  copyMethod?: string;
  dbPath?: string;
  attachmentRoot?: string;
  startDate?: string;
  endDate?: string;
  contacts?: string;
  skipExport?: boolean;
  rename: boolean;
  dryRun?: boolean;
  verbose?: boolean;
};

export type ParsedArgs =
  | { action: 'run'; options: Record<string, unknown> }
  | { action: 'exit'; exitCode: number };

const EXAMPLES = `
Examples:
  $ chat-export-tidy
  $ chat-export-tidy -f html -c basic -o ~/Documents/messages
  $ chat-export-tidy --dry-run --verbose
  $ chat-export-tidy -s 2023-01-01 -e 2023-12-31
  $ chat-export-tidy --skip-export --contacts ~/contacts.vcf -o ./export`;

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name('chat-export-tidy')
    .description('Export iMessage conversations, name files after their contacts and date them by their messages')
    .version('0.1.0')
    .helpOption('-h, --help', 'Show this help message')
    .option('-o, --output <dir>', 'Output directory (default: ./imessage_export)')
    .option('-f, --format <format>', 'Export format: txt or html (default: txt)')
    .option('-c, --copy-method <method>', 'Attachment copy method: disabled, clone, basic, full (default: disabled)')
    .option('-p, --db-path <path>', 'Custom iMessage database path')
    .option('-r, --attachment-root <path>', 'Custom attachment root path')
    .option('-s, --start-date <date>', 'Start date (YYYY-MM-DD)')
    .option('-e, --end-date <date>', 'End date (YYYY-MM-DD)')
    .option('--contacts <file>', 'Read contacts from a .vcf file instead of Apple Contacts')
    .option('--skip-export', 'Only post-process files already in the output directory')
    .option('--no-rename', 'Skip contact name renaming')
    .option('--dry-run', 'Show what would be done without making changes')
    .option('--verbose', 'Show detailed output')
    .addHelpText('after', EXAMPLES)
    .allowExcessArguments(false)
    .exitOverride();

  // Parse errors are reported by the caller as ArgumentError.
  program.configureOutput({ outputError: () => undefined, ...output });
  return program;
}

/** Map parsed flags onto config keys, leaving unset flags undefined. */
function toConfigInput(opts: CliOptions): Record<string, unknown> {
  return {
    outputDirectory: opts.output,
    format: opts.format,
    copyMethod: opts.copyMethod,
    databasePath: opts.dbPath,
    attachmentPath: opts.attachmentRoot,
    startDate: opts.startDate,
    endDate: opts.endDate,
    contactsFile: opts.contacts,
    skipExport: opts.skipExport,
    renameFiles: opts.rename,
    dryRun: opts.dryRun,
    verbose: opts.verbose,
  };
}

export function parseArgs(argv: string[], output?: OutputConfiguration): ParsedArgs {
  const program = createProgram(output);
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) return { action: 'exit', exitCode: 0 };
      throw new ArgumentError(err.message.replace(/^error:\s*/, ''));
    }
    throw err;
  }
  return { action: 'run', options: toConfigInput(program.opts<CliOptions>()) };
}

/** Parse, configure and run. Resolves to the process exit code. */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if (parsed.action === 'exit') return parsed.exitCode;

    const config = await loadConfig(parsed.options);
    setVerbose(config.verbose);
    await runPipeline(config, deps);
    return 0;
  } catch (err) {
    if (!isFatal(err)) throw err;
    logger.error(describeError(err));
    if (err instanceof ArgumentError) logger.error('Use --help for usage information');
    else logger.error('❌ Exiting.');
    return 1;
  }
}
