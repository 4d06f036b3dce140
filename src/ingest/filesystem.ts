import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigError, describeError } from '../common/errors';
import { IgnoreMatcher } from '../common/ignore';
import { getLogger } from '../common/logger';
import { FileEntry, SkippedEntry, WalkOptions, WalkResult } from './types';

const log = getLogger('walk');

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * A symlink is walked as a file when it resolves to a regular file.
 * Dangling links and links to directories are not followed.
 */
async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (error) {
    log.debug(`Not following symlink ${linkPath}: ${describeError(error)}`);
    return false;
  }
}

export class FilesystemSource {
  private readonly rootPath: string;

  constructor(rootPath: string, private readonly matcher: IgnoreMatcher = new IgnoreMatcher()) {
    this.rootPath = resolve(rootPath);
  }

  /**
   * Walk the whole tree depth-first with entries in name order. Ignored
   * files are reported in `skipped` and never opened.
   */
  async walk(options: WalkOptions = {}): Promise<WalkResult> {
    const excluded = new Set((options.excludeDirectories ?? []).map((dir) => resolve(dir)));
    const result: WalkResult = { files: [], skipped: [] };
    await this.walkDirectory('.', excluded, result.files, result.skipped);
    return result;
  }

  private async walkDirectory(
    relativeDir: string,
    excluded: Set<string>,
    files: FileEntry[],
    skipped: SkippedEntry[],
  ): Promise<void> {
    const absoluteDir = join(this.rootPath, relativeDir);
    let dirEntries: Dirent[];
    try {
      dirEntries = await readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      throw new ConfigError(`Cannot list directory ${absoluteDir}: ${describeError(error)}`, absoluteDir);
    }
    dirEntries.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of dirEntries) {
      const relPath = relativeDir === '.' ? entry.name : `${relativeDir}/${entry.name}`;
      const fullPath = join(this.rootPath, relPath);

      if (entry.isDirectory()) {
        if (excluded.has(fullPath)) {
          log.debug(`Not descending into output directory ${relPath}`);
          continue;
        }
        await this.walkDirectory(relPath, excluded, files, skipped);
      } else if (entry.isFile() || (entry.isSymbolicLink() && (await isFileTarget(fullPath)))) {
        const pattern = this.matcher.match(relPath);
        if (pattern !== undefined) {
          log.debug(`Ignoring file ${relPath}`, { pattern });
          skipped.push({ path: relPath, pattern });
          continue;
        }
        files.push({ path: relPath, absolutePath: fullPath });
      } else {
        log.debug(`Skipping non-regular entry ${relPath}`);
      }
    }
  }
}
