import { readFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parse as parseToml } from 'toml';
import type { ZodError } from 'zod';
import { ConfigError, ConfigIssue, ConfigValidationError, describeError } from '../common/errors';
import { AnonymizerConfigSchema } from './schema';
import { AnonymizerConfigFile, FileSettings } from './types';

const PATH_KEYS = ['source', 'output', 'rules', 'ignore'] as const;

function parseContents(contents: string, absolute: string): unknown {
  const ext = extname(absolute).toLowerCase();
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return loadYaml(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        break;
    }
  } catch (error) {
    throw new ConfigError(`Failed to parse config ${absolute}: ${describeError(error)}`, absolute);
  }
  throw new ConfigError(`Unsupported config format for ${absolute}`, absolute);
}

function describeIssue(issue: ConfigIssue, segments: string[]): string {
  if (segments[0] === 'profiles' && segments.length > 1) {
    const [, name, ...rest] = segments;
    return rest.length === 0
      ? `Profile ${name} ${issue.message}`
      : `Profile ${name}: "${rest.join('.')}" ${issue.message}`;
  }
  return segments.length === 0 ? `Config ${issue.message}` : `Config: "${issue.path}" ${issue.message}`;
}

function fromZodError(error: ZodError, absolute: string): ConfigValidationError {
  const described: string[] = [];
  const issues = error.issues.map((entry) => {
    const segments = entry.path.map(String);
    const issue: ConfigIssue = { path: segments.join('.'), message: entry.message };
    described.push(describeIssue(issue, segments));
    return issue;
  });
  return new ConfigValidationError(described.join('; '), issues, absolute);
}

function readConfigFile(value: unknown, absolute: string): AnonymizerConfigFile {
  const parsed = AnonymizerConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw fromZodError(parsed.error, absolute);
  }
  return parsed.data;
}

function normalizeConfigPaths(settings: FileSettings, baseDir: string): FileSettings {
  const normalized: FileSettings = { ...settings };
  for (const key of PATH_KEYS) {
    const value = settings[key];
    if (value !== undefined && !isAbsolute(value)) {
      normalized[key] = resolve(baseDir, value);
    }
  }
  return normalized;
}

/**
 * Load run settings from a YAML, TOML or JSON file, optionally overlaid with
 * a named profile. Relative paths resolve against the file's directory.
 */
export async function loadConfig(path: string, profile?: string): Promise<FileSettings> {
  const absolute = resolve(path);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to read config ${absolute}: ${describeError(error)}`, absolute);
  }

  const { profiles, ...base } = readConfigFile(parseContents(contents, absolute), absolute);

  if (profile) {
    const overlay = profiles?.[profile];
    if (!overlay) {
      throw new ConfigError(`Profile ${profile} not found in config`, absolute);
    }
    return normalizeConfigPaths({ ...base, ...overlay }, dirname(absolute));
  }

  return normalizeConfigPaths(base, dirname(absolute));
}
