import { getLogger } from './logger';
import { readListFile } from './listFile';

const log = getLogger('ignore');

export interface IgnoreRule {
  pattern: string;
  regex: RegExp;
}

interface GlobCompileOptions {
  literalClasses?: boolean;
}

function escapeRegExpChar(char: string): string {
  return /[\\^$+.()|{}[\]]/.test(char) ? `\\${char}` : char;
}

function toPosix(value: string): string {
  return value.replace(/\\/g, '/');
}

function translateClassMembers(members: string): string {
  return members.replace(/[\\\]]/g, '\\$&').replace(/^\^/, '\\^');
}

function translateGlob(pattern: string, options: GlobCompileOptions): string {
  let regex = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    if (char === '*') {
      if (pattern[i + 1] === '*') {
        if (pattern[i + 2] === '/') {
          regex += '(?:.*/)?';
          i += 3;
        } else {
          regex += '.*';
          i += 2;
        }
      } else {
        regex += '[^/]*';
        i += 1;
      }
      continue;
    }
    if (char === '?') {
      regex += '[^/]';
      i += 1;
      continue;
    }
    if (char === '[' && !options.literalClasses) {
      const negated = pattern[i + 1] === '!';
      const start = negated ? i + 2 : i + 1;
      // A `]` right after the opening bracket is a member, not the end.
      const end = pattern.indexOf(']', start + 1);
      if (end !== -1) {
        const members = translateClassMembers(pattern.slice(start, end));
        regex += negated ? `[^/${members}]` : `(?!/)[${members}]`;
        i = end + 1;
        continue;
      }
    }
    regex += escapeRegExpChar(char);
    i += 1;
  }
  return `^${regex}$`;
}

/**
 * Convert a glob into an anchored regular expression: `*` and `?` stay
 * within one path segment, `**` crosses segments, `[...]` is a character
 * class (`[!...]` negated) that never matches `/`. Never throws: a class
 * that does not form a valid expression is matched literally.
 */
export function compileGlobToRegExp(pattern: string): RegExp {
  const normalized = toPosix(pattern);
  try {
    return new RegExp(translateGlob(normalized, {}));
  } catch {
    return new RegExp(translateGlob(normalized, { literalClasses: true }));
  }
}

/**
 * Rewrite an ignore-list entry into a root-relative glob.
 * Returns undefined for blank lines, comments and bare separators.
 */
export function normalizePattern(pattern: string): string | undefined {
  const trimmed = toPosix(pattern.trim());
  if (trimmed === '' || trimmed.startsWith('#')) {
    return undefined;
  }

  const directoryOnly = trimmed.endsWith('/');
  let body = trimmed.replace(/\/+$/, '');
  const anchored = body.startsWith('/') || body.includes('/');
  body = body.replace(/^\/+/, '');
  if (body === '') {
    return undefined;
  }
  if (!anchored) {
    body = `**/${body}`;
  }
  if (directoryOnly) {
    body = `${body}/**`;
  }
  return body;
}

export class IgnoreMatcher {
  private readonly rules: IgnoreRule[];

  constructor(patterns: string[] = []) {
    this.rules = patterns.flatMap((pattern) => {
      const body = normalizePattern(pattern);
      return body === undefined ? [] : [{ pattern: pattern.trim(), regex: compileGlobToRegExp(body) }];
    });
  }

  /**
   * Return the first pattern that ignores `path` (relative to the source
   * root), or undefined. Only the path itself is tested; a directory is
   * ignored as a whole through a trailing `/` in the pattern.
   */
  match(path: string): string | undefined {
    const candidate = toPosix(path).replace(/^\.\//, '');
    return this.rules.find((rule) => rule.regex.test(candidate))?.pattern;
  }
}

export async function loadIgnorePatterns(path: string): Promise<string[]> {
  const entries = await readListFile(path, 'Ignore file');
  const patterns = entries.map((entry) => toPosix(entry.text));
  log.info(`Loaded ${patterns.length} ignore patterns`, { file: path });
  return patterns;
}
