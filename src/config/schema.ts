import { z } from 'zod';

const MAPPING = 'must be a mapping';
const POSITIVE_INTEGER = 'must be a positive integer';

const PathSchema = z.string({ invalid_type_error: 'must be a string' });

/** Settings a config file (or one of its profiles) may carry. */
export const FileSettingsSchema = z.object(
  {
    source: PathSchema.optional(),
    output: PathSchema.optional(),
    rules: PathSchema.optional(),
    ignore: PathSchema.optional(),
    placeholder: z.string({ invalid_type_error: 'must be a string' }).optional(),
    stripLength: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
    concurrency: z
      .number({ invalid_type_error: POSITIVE_INTEGER })
      .int(POSITIVE_INTEGER)
      .min(1, POSITIVE_INTEGER)
      .optional(),
  },
  { invalid_type_error: MAPPING },
);

export const AnonymizerConfigSchema = FileSettingsSchema.extend({
  profiles: z.record(FileSettingsSchema, { invalid_type_error: MAPPING }).optional(),
});
