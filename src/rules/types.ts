export interface SanitizerRule {
  /** 1-based line in the rules file the pattern came from. */
  line: number;
  source: string;
  /** Always compiled with the global flag. */
  pattern: RegExp;
}

export interface ScrubOptions {
  placeholder: string;
  /** Replace each match with a single placeholder instead of tiling it to the match length. */
  stripLength: boolean;
}

export interface ScrubResult {
  text: string;
  count: number;
}

export interface SanitizeResult {
  sanitized: string;
  appliedRules: SanitizerRule[];
  replacements: number;
}
