/** Bad or missing flag value, unknown flag, or invalid enum value. Fatal. */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/** A matching pattern or config file that cannot be used. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AuthorizationError extends Error {
  constructor(provider: string, message: string) {
    super(`[${provider}] ${message}`);
    this.name = 'AuthorizationError';
  }
}

export class ProviderError extends Error {
  constructor(provider: string, message: string) {
    super(`[${provider}] ${message}`);
    this.name = 'ProviderError';
  }
}

export class SubprocessError extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'SubprocessError';
    this.exitCode = exitCode;
  }
}

export class RenameError extends Error {
  constructor(from: string, to: string, cause: unknown) {
    super(`Error renaming ${from} to ${to}: ${describeError(cause)}`);
    this.name = 'RenameError';
  }
}

export class StampError extends Error {
  constructor(filePath: string, cause: unknown) {
    super(`Error updating timestamps for ${filePath}: ${describeError(cause)}`);
    this.name = 'StampError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errors that stop the run with a non-zero exit. */
export function isFatal(err: unknown): boolean {
  return err instanceof ArgumentError
    || err instanceof ConfigurationError
    || err instanceof SubprocessError;
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
