import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Which files under a board root are platform definitions. */
export const ScanConfigSchema = z.object({
  /** Glob patterns for platform files */
  include: z.array(z.string()).default(['**/*.yaml']),
  /** Glob patterns to skip */
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**', '**/platform-meta.yaml']),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  platforms: withDefaults(ScanConfigSchema),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
