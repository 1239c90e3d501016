/**
 * Schema of a platform definition file.
 *
 * Parsed once when this module loads and shared by every Platform; nothing
 * mutates it afterwards. Optional keys accept an explicit null, which the
 * loader treats the same as an absent key.
 */
import { z } from 'zod';
import { PLATFORM_ARCHS, PLATFORM_TYPES } from './constants.js';

const StringListSchema = z.array(z.string()).nullish();

/** Renode-specific settings under `testing.renode`. */
export const RenodeSettingsSchema = z.object({
  /** UART the test output is read from */
  uart: z.string().nullish(),
  /** Renode script that sets up the machine */
  resc: z.string().nullish(),
}).strict();

export type RenodeSettings = z.infer<typeof RenodeSettingsSchema>;

/** Test-selection settings under `testing`. */
export const TestingSettingsSchema = z.object({
  timeout_multiplier: z.number().positive().nullish(),
  ignore_tags: StringListSchema,
  only_tags: StringListSchema,
  /** Whether the platform is part of the default platform set */
  default: z.boolean().nullish(),
  binaries: StringListSchema,
  renode: RenodeSettingsSchema.nullish(),
}).strict();

export type TestingSettings = z.infer<typeof TestingSettingsSchema>;

/**
 * One `simulation` entry. The simulator kind is checked when the Simulator
 * is constructed, not here.
 */
export const SimulatorEntrySchema = z.object({
  name: z.string(),
  exec: z.string().nullish(),
}).strict();

export type SimulatorEntry = z.infer<typeof SimulatorEntrySchema>;

export const PlatformFileSchema = z.object({
  identifier: z.string().min(1),
  /** Human-readable board name */
  name: z.string().nullish(),
  arch: z.enum(PLATFORM_ARCHS),
  vendor: z.string().nullish(),
  tier: z.number().int().nullish(),
  type: z.enum(PLATFORM_TYPES).nullish(),
  ram: z.number().int().nonnegative().nullish(),
  flash: z.number().int().nonnegative().nullish(),
  sysbuild: z.boolean().nullish(),
  twister: z.boolean().nullish(),
  supported: StringListSchema,
  simulation: z.array(SimulatorEntrySchema).nullish(),
  toolchain: StringListSchema,
  env: StringListSchema,
  testing: TestingSettingsSchema.nullish(),
}).strict();

export type PlatformFile = z.infer<typeof PlatformFileSchema>;
