import { SanitizeResult, SanitizerRule, ScrubOptions, ScrubResult } from './types';

/**
 * Build the text that replaces one match. Lengths are counted in code
 * points, so a tiled placeholder lines up with the characters it hides.
 */
export function buildReplacement(matched: string, placeholder: string, stripLength: boolean): string {
  if (stripLength) {
    return placeholder;
  }

  const length = Array.from(matched).length;
  const tile = Array.from(placeholder);
  if (tile.length === 1) {
    return placeholder.repeat(length);
  }

  const repetitions = Math.floor(length / tile.length);
  const remainder = length % tile.length;
  return placeholder.repeat(repetitions) + tile.slice(0, remainder).join('');
}

export function scrub(text: string, rule: SanitizerRule, options: ScrubOptions): ScrubResult {
  let count = 0;
  rule.pattern.lastIndex = 0;
  const result = text.replace(rule.pattern, (matched: string) => {
    count += 1;
    return buildReplacement(matched, options.placeholder, options.stripLength);
  });
  return { text: result, count };
}

/**
 * Applies rules in order, each one to the output of the previous one, so a
 * later rule sees the placeholders an earlier rule inserted.
 */
export class ContentSanitizer {
  constructor(
    private readonly rules: readonly SanitizerRule[],
    private readonly options: ScrubOptions,
  ) {}

  sanitize(text: string): SanitizeResult {
    let result = text;
    let replacements = 0;
    const appliedRules: SanitizerRule[] = [];

    for (const rule of this.rules) {
      const scrubbed = scrub(result, rule, this.options);
      if (scrubbed.count > 0) {
        appliedRules.push(rule);
        replacements += scrubbed.count;
      }
      result = scrubbed.text;
    }

    return { sanitized: result, appliedRules, replacements };
  }
}
