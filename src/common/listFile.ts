import { readFile } from 'node:fs/promises';
import { ConfigError, describeError, errorCode } from './errors';

export interface ListEntry {
  /** 1-based line number in the source file. */
  line: number;
  text: string;
}

/**
 * Split list-file contents into trimmed entries, dropping blank lines and
 * lines whose first non-whitespace character is `#`.
 */
export function parseListContents(contents: string): ListEntry[] {
  return contents
    .split(/\r?\n/)
    .map((raw, index) => ({ line: index + 1, text: raw.trim() }))
    .filter((entry) => entry.text !== '' && !entry.text.startsWith('#'));
}

export async function readListFile(path: string, label: string): Promise<ListEntry[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new ConfigError(`${label} not found: ${path}`, path);
    }
    if (code === 'EACCES' || code === 'EPERM') {
      throw new ConfigError(`${label} is not readable: ${path}`, path);
    }
    if (code === 'EISDIR') {
      throw new ConfigError(`${label} is a directory: ${path}`, path);
    }
    throw new ConfigError(`Failed to read ${label.toLowerCase()} ${path}: ${describeError(error)}`, path);
  }
  return parseListContents(contents);
}
