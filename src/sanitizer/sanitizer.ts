import { mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConfigError, ReadError, WriteError, describeError } from '../common/errors';
import { IgnoreMatcher, loadIgnorePatterns } from '../common/ignore';
import { getLogger } from '../common/logger';
import { RunConfig } from '../config/types';
import { FilesystemSource } from '../ingest/filesystem';
import { readTextFile } from '../ingest/text';
import { FileEntry } from '../ingest/types';
import { loadRules } from '../rules/loader';
import { ContentSanitizer } from '../rules/scrub';
import { SanitizerRule } from '../rules/types';
import { FileFailure, FileOutcome, RunResult } from './types';

const log = getLogger('sanitizer');

interface PreparedRun {
  sourceDir: string;
  outputDir: string;
  rules: SanitizerRule[];
  matcher: IgnoreMatcher;
  concurrency: number;
}

function validateOptions(config: RunConfig): number {
  if (config.placeholder === '') {
    throw new ConfigError('Placeholder must not be empty');
  }
  const concurrency = config.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  return concurrency;
}

async function ensureSourceDirectory(sourceDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(sourceDir)).isDirectory();
  } catch (error) {
    throw new ConfigError(`Source directory is not accessible: ${sourceDir} (${describeError(error)})`, sourceDir);
  }
  if (!isDirectory) {
    throw new ConfigError(`Source path is not a directory: ${sourceDir}`, sourceDir);
  }
}

async function ensureOutputDirectory(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ConfigError(`Cannot create output directory ${outputDir}: ${describeError(error)}`, outputDir);
  }
}

function toFailure(error: ReadError | WriteError): FileFailure {
  return {
    path: error.path,
    phase: error instanceof ReadError ? 'read' : 'write',
    error: error.name,
    message: error.message,
  };
}

/**
 * Copies a source tree into an output tree with every rule match redacted.
 *
 * A run goes through three phases in order. LOAD reads the rules and ignore
 * patterns and checks both directories; any failure there rejects before a
 * single log file is touched. WALK lists the source tree and sets ignored
 * files aside. TRANSFORM reads, scrubs and writes each remaining file; a
 * read or write failure is recorded against that file and the run moves on.
 *
 * Instances hold no state between runs.
 */
export class LogSanitizer {
  async run(config: RunConfig): Promise<RunResult> {
    const started = performance.now();
    const prepared = await this.load(config);

    const source = new FilesystemSource(prepared.sourceDir, prepared.matcher);
    const { files, skipped } = await source.walk({ excludeDirectories: [prepared.outputDir] });
    log.info(`Found ${files.length + skipped.length} files`, { skipped: skipped.length });

    const sanitizer = new ContentSanitizer(prepared.rules, {
      placeholder: config.placeholder,
      stripLength: config.stripLength,
    });
    const outcomes = await this.transformAll(files, prepared, sanitizer);

    const failures = outcomes
      .filter((outcome): outcome is Extract<FileOutcome, { status: 'failed' }> => outcome.status === 'failed')
      .map((outcome) => outcome.failure)
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    const processed = outcomes.filter((outcome) => outcome.status === 'processed').length;
    const replacements = outcomes.reduce(
      (sum, outcome) => sum + (outcome.status === 'processed' ? outcome.replacements : 0),
      0,
    );

    const result: RunResult = {
      scanned: files.length + skipped.length,
      skipped: skipped.length,
      processed,
      failed: failures.length,
      failures,
      skippedPaths: skipped.map((entry) => entry.path),
      replacements,
      durationMs: Math.round((performance.now() - started) * 100) / 100,
    };

    log.info(`Sanitized ${result.processed} files (${result.skipped} skipped, ${result.failed} failed)`, {
      replacements: result.replacements,
      durationMs: result.durationMs,
    });
    return result;
  }

  private async load(config: RunConfig): Promise<PreparedRun> {
    const concurrency = validateOptions(config);
    const rules = await loadRules(config.rulesFile);
    const patterns = config.ignoreFile ? await loadIgnorePatterns(config.ignoreFile) : [];

    const sourceDir = resolve(config.sourceDir);
    const outputDir = resolve(config.outputDir);
    if (sourceDir === outputDir) {
      throw new ConfigError(`Output directory must differ from source directory: ${sourceDir}`, outputDir);
    }
    await ensureSourceDirectory(sourceDir);
    await ensureOutputDirectory(outputDir);

    return { sourceDir, outputDir, rules, matcher: new IgnoreMatcher(patterns), concurrency };
  }

  private async transformAll(
    files: FileEntry[],
    prepared: PreparedRun,
    sanitizer: ContentSanitizer,
  ): Promise<FileOutcome[]> {
    const outcomes: FileOutcome[] = [];
    const workerCount = Math.min(prepared.concurrency, files.length);
    let cursor = 0;

    const workers = Array.from({ length: workerCount }, async () => {
      while (cursor < files.length) {
        const file = files[cursor];
        cursor += 1;
        outcomes.push(await this.transformFile(file, prepared.outputDir, sanitizer));
      }
    });
    await Promise.all(workers);

    return outcomes;
  }

  private async transformFile(file: FileEntry, outputDir: string, sanitizer: ContentSanitizer): Promise<FileOutcome> {
    log.info(`Processing ${file.path}`);
    try {
      const content = await readTextFile(file.absolutePath, file.path);
      const { sanitized, appliedRules, replacements } = sanitizer.sanitize(content);
      if (appliedRules.length > 0) {
        log.debug(`Applied rules to ${file.path}`, { rules: appliedRules.map((rule) => rule.line), replacements });
      }
      await this.writeOutput(join(outputDir, ...file.path.split('/')), file.path, sanitized);
      return { status: 'processed', path: file.path, replacements };
    } catch (error) {
      if (error instanceof ReadError || error instanceof WriteError) {
        log.error(error.message, { path: file.path });
        return { status: 'failed', failure: toFailure(error) };
      }
      throw error;
    }
  }

  private async writeOutput(destination: string, displayPath: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, content, 'utf8');
    } catch (error) {
      throw new WriteError(displayPath, describeError(error));
    }
  }
}

export async function run(config: RunConfig): Promise<RunResult> {
  return new LogSanitizer().run(config);
}
