/** Base class for every error raised by the anonymizer. */
export class SanitizerError extends Error {
  readonly name: string = 'SanitizerError';
}

/**
 * Missing or unusable run input: rules/ignore file, source or output
 * directory, or an invalid option value. Always fatal.
 */
export class ConfigError extends SanitizerError {
  readonly name: string = 'ConfigError';

  constructor(message: string, public readonly path?: string) {
    super(message);
  }
}

export interface ConfigIssue {
  /** Dotted key path inside the config document; empty for the document itself. */
  path: string;
  message: string;
}

/** A config document that parsed but holds values of the wrong shape. */
export class ConfigValidationError extends ConfigError {
  readonly name: string = 'ConfigValidationError';

  constructor(message: string, public readonly issues: ConfigIssue[], path?: string) {
    super(message, path);
  }
}

export class RuleCompileError extends SanitizerError {
  readonly name: string = 'RuleCompileError';

  constructor(
    public readonly file: string,
    public readonly line: number,
    public readonly source: string,
    reason: string,
  ) {
    super(`Invalid regular expression on line ${line} of ${file}: ${source} (${reason})`);
  }
}

export class ReadError extends SanitizerError {
  readonly name: string = 'ReadError';

  constructor(public readonly path: string, reason: string) {
    super(`Cannot read ${path} as text: ${reason}`);
  }
}

export class WriteError extends SanitizerError {
  readonly name: string = 'WriteError';

  constructor(public readonly path: string, reason: string) {
    super(`Cannot write ${path}: ${reason}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
