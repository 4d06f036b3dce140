import type { z } from 'zod';
import type { AnonymizerConfigSchema, FileSettingsSchema } from './schema';

/** Everything one run of the sanitizer needs. Passed explicitly to `run()`. */
export interface RunConfig {
  sourceDir: string;
  outputDir: string;
  rulesFile: string;
  /** Absent means no ignore patterns. */
  ignoreFile?: string;
  placeholder: string;
  stripLength: boolean;
  /** Number of files transformed at once; 1 keeps the run sequential. */
  concurrency?: number;
}

export type FileSettings = z.infer<typeof FileSettingsSchema>;

export type AnonymizerConfigFile = z.infer<typeof AnonymizerConfigSchema>;

export const DEFAULT_SETTINGS = {
  source: 'source',
  output: 'results',
  rules: 'main.rule',
  ignore: 'ignore.list',
  placeholder: '*',
  stripLength: false,
  concurrency: 1,
} as const satisfies Required<FileSettings>;
