let verbose = Boolean(process.env.DEBUG);

/** Progress goes to stdout; warnings and errors to stderr. Debug output only in verbose mode. */
export const logger = {
  info: (...args: unknown[]) => console.log(...args),
  warn: (...args: unknown[]) => console.error('[WARN]', ...args),
  error: (...args: unknown[]) => console.error('[ERROR]', ...args),
  debug: (...args: unknown[]) => {
    if (verbose) console.log(...args);
  },
};

export function setVerbose(enabled: boolean): void {
  verbose = enabled || Boolean(process.env.DEBUG);
}
