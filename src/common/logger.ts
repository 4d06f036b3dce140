import { Writable } from 'node:stream';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export const LOG_FORMATS = ['text', 'json'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];
export type LogMetadata = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Map a repeated `-v` flag count onto a level: none keeps warnings and
 * errors only, one adds progress, two or more add per-rule detail.
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) {
    return 'debug';
  }
  if (verbosity === 1) {
    return 'info';
  }
  return 'warn';
}

export interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  destination: Writable;
}

export class Logger {
  private readonly settings: LoggerSettings;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}, shared?: LoggerSettings) {
    // Children share their parent's settings so that configureLogger()
    // reaches loggers that modules created at import time.
    this.settings = shared ?? {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      destination: options.destination ?? process.stderr,
    };
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.settings);
  }

  configure(options: Omit<LoggerOptions, 'scope'>): void {
    this.settings.level = options.level ?? this.settings.level;
    this.settings.format = options.format ?? this.settings.format;
    this.settings.destination = options.destination ?? this.settings.destination;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.settings.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: LogMetadata = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: LogMetadata = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: LogMetadata = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: LogMetadata = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: LogMetadata) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    if (this.settings.format === 'json') {
      const payload = { level, time: timestamp, message, scope: this.scope, ...metadata };
      this.settings.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const scopeLabel = this.scope ? `[${this.scope}] ` : '';
    const suffix = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    this.settings.destination.write(`${prefix}${scopeLabel}${message}${suffix}\n`);
  }
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: Omit<LoggerOptions, 'scope'>): void {
  globalLogger.configure(options);
}
