import { ConfigError, RuleCompileError, describeError } from '../common/errors';
import { readListFile } from '../common/listFile';
import { getLogger } from '../common/logger';
import { SanitizerRule } from './types';

const log = getLogger('rules');

export function compileRule(file: string, line: number, source: string): SanitizerRule {
  try {
    return { line, source, pattern: new RegExp(source, 'g') };
  } catch (error) {
    throw new RuleCompileError(file, line, source, describeError(error));
  }
}

/**
 * Load the rules file, one regular expression per line, in application
 * order. The first pattern that fails to compile rejects the whole file.
 */
export async function loadRules(path: string): Promise<SanitizerRule[]> {
  const entries = await readListFile(path, 'Rules file');
  const rules = entries.map((entry) => compileRule(path, entry.line, entry.text));

  if (rules.length === 0) {
    throw new ConfigError(`No sanitization rules found in ${path}`, path);
  }

  log.info(`Loaded ${rules.length} sanitization rules`, { file: path });
  return rules;
}
