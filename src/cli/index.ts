import { Command } from 'commander';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConfigError, describeError } from '../common/errors';
import {
  configureLogger,
  getLogger,
  isLogFormat,
  isLogLevel,
  levelFromVerbosity,
  LogFormat,
  LogLevel,
  LOG_FORMATS,
  LOG_LEVELS,
} from '../common/logger';
import { loadConfig } from '../config/loader';
import { DEFAULT_SETTINGS, FileSettings, RunConfig } from '../config/types';
import { run } from '../sanitizer/sanitizer';
import { RunResult } from '../sanitizer/types';

export type CliOptions = {
  source?: string;
  output?: string;
  rules?: string;
  ignore?: string;
  placeholder?: string;
  stripLength?: boolean;
  concurrency?: string;
  config?: string;
  profile?: string;
  report?: string;
  verbose: number;
  logLevel?: string;
  logFormat?: string;
};

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new ConfigError(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogFormat(normalized)) {
    return normalized;
  }
  throw new ConfigError(`Unsupported log format "${value}". Use ${LOG_FORMATS.join(' or ')}.`);
}

export function parseConcurrency(value?: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got "${value}"`);
  }
  return parsed;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Merge CLI flags over config-file settings over built-in defaults.
 * The default ignore list is optional: when nobody named an ignore file and
 * `ignore.list` is absent, the run has no ignore patterns.
 */
export async function resolveRunConfig(options: CliOptions, settings: FileSettings = {}): Promise<RunConfig> {
  let ignoreFile = options.ignore ?? settings.ignore;
  if (ignoreFile === undefined && (await pathExists(DEFAULT_SETTINGS.ignore))) {
    ignoreFile = DEFAULT_SETTINGS.ignore;
  }

  return {
    sourceDir: options.source ?? settings.source ?? DEFAULT_SETTINGS.source,
    outputDir: options.output ?? settings.output ?? DEFAULT_SETTINGS.output,
    rulesFile: options.rules ?? settings.rules ?? DEFAULT_SETTINGS.rules,
    ignoreFile,
    placeholder: options.placeholder ?? settings.placeholder ?? DEFAULT_SETTINGS.placeholder,
    stripLength: options.stripLength ?? settings.stripLength ?? DEFAULT_SETTINGS.stripLength,
    concurrency: parseConcurrency(options.concurrency) ?? settings.concurrency ?? DEFAULT_SETTINGS.concurrency,
  };
}

async function writeReport(path: string, result: RunResult): Promise<void> {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(result, null, 2)}\n`);
}

/** Run once with parsed options and return the process exit status. */
export async function execute(options: CliOptions): Promise<number> {
  const log = getLogger('cli');
  try {
    configureLogger({
      level: parseLogLevel(options.logLevel) ?? levelFromVerbosity(options.verbose),
      format: parseLogFormat(options.logFormat),
    });

    if (options.profile && !options.config) {
      throw new ConfigError('--profile requires --config');
    }
    const settings = options.config ? await loadConfig(options.config, options.profile) : {};
    const result = await run(await resolveRunConfig(options, settings));

    if (options.report) {
      await writeReport(options.report, result);
      log.info(`Run report written to ${resolve(options.report)}`);
    }
    if (result.failed > 0) {
      log.warn(`${result.failed} of ${result.scanned} files could not be sanitized`);
      return 1;
    }
    return 0;
  } catch (error) {
    log.error(`Run aborted: ${describeError(error)}`);
    return 1;
  }
}

export function createProgram(handler: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();
  program
    .name('log-anonymizer')
    .description('Copy log files with sensitive tokens redacted by regular-expression rules')
    .option('--source <dir>', `Directory containing files to sanitize (default: ${DEFAULT_SETTINGS.source})`)
    .option('--output <dir>', `Directory to write anonymized files to (default: ${DEFAULT_SETTINGS.output})`)
    .option('--rules <file>', `Rules file, one regular expression per line (default: ${DEFAULT_SETTINGS.rules})`)
    .option('--ignore <file>', `Glob patterns for files to skip (default: ${DEFAULT_SETTINGS.ignore}, if present)`)
    .option('--placeholder <text>', `Replacement token for matches (default: ${DEFAULT_SETTINGS.placeholder})`)
    .option('--strip-length', 'Replace each match with a single placeholder instead of keeping its length')
    .option('--no-strip-length', 'Keep the length of each match, overriding a config file')
    .option('--concurrency <n>', 'Number of files to transform at once (default: 1)')
    .option('--config <path>', 'YAML, TOML or JSON file with run settings')
    .option('--profile <name>', 'Config profile to overlay')
    .option('--report <path>', 'Write the run summary as JSON')
    .option('-v, --verbose', 'Increase logging verbosity (use -vv for debug)', increaseVerbosity, 0)
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.LOG_ANONYMIZER_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.LOG_ANONYMIZER_LOG_FORMAT)
    .action(async () => {
      await handler(program.opts<CliOptions>());
    });
  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (options) => {
    exitCode = await execute(options);
  });
  await program.parseAsync(argv);
  return exitCode;
}
