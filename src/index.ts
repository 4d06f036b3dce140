export * from './common/errors';
export { IgnoreMatcher, compileGlobToRegExp, loadIgnorePatterns, normalizePattern } from './common/ignore';
export { Logger, configureLogger, getLogger, levelFromVerbosity } from './common/logger';
export type { LogFormat, LogLevel, LoggerOptions } from './common/logger';
export { loadConfig } from './config/loader';
export { AnonymizerConfigSchema, FileSettingsSchema } from './config/schema';
export { DEFAULT_SETTINGS } from './config/types';
export type { AnonymizerConfigFile, FileSettings, RunConfig } from './config/types';
export { loadRules, compileRule } from './rules/loader';
export { ContentSanitizer, buildReplacement, scrub } from './rules/scrub';
export type { SanitizeResult, SanitizerRule, ScrubOptions, ScrubResult } from './rules/types';
export { LogSanitizer, run } from './sanitizer/sanitizer';
export type { FileFailure, RunResult } from './sanitizer/types';
