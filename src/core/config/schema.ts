/**
 * Configuration schema for `.iching/config.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Output format for readings. */
export const OutputFormatSchema = z.enum(['full', 'brief', 'json', 'numbers', 'motd']);

/** Output settings. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('full'),
  colors: z.boolean().default(true),
});

/** Entropy source for coin casting. */
export const RandomSourceSchema = z.enum(['crypto', 'math']);

export const RandomSettingsSchema = z.object({
  source: RandomSourceSchema.default('crypto'),
});

/** Text corpus settings. */
export const CorpusSettingsSchema = z.object({
  /** YAML corpus path, relative to the project root; the bundled corpus when absent */
  path: z.string().optional(),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Root configuration. */
export const ConfigSchema = z.object({
  output: withDefaults(OutputSettingsSchema),
  random: withDefaults(RandomSettingsSchema),
  corpus: withDefaults(CorpusSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
