/**
 * Closed sets of simulator kinds, architectures and platform types.
 */

/** Simulator kinds a platform file may declare under `simulation`. */
export const SUPPORTED_SIMULATORS = [
  'mdb-nsim',
  'nsim',
  'renode',
  'qemu',
  'tsim',
  'armfvp',
  'xt-sim',
  'native',
  'custom',
  'simics',
] as const;

export type SimulatorName = (typeof SUPPORTED_SIMULATORS)[number];

/** Simulator kind that is assumed to be available everywhere. */
export const ALWAYS_RUNNABLE_SIMULATOR: SimulatorName = 'qemu';

export function isSupportedSimulator(value: unknown): value is SimulatorName {
  return SUPPORTED_SIMULATORS.some((name) => name === value);
}

export const PLATFORM_ARCHS = [
  'arc',
  'arm',
  'arm64',
  'mips',
  'nios2',
  'posix',
  'riscv',
  'sparc',
  'x86',
  'xtensa',
  'unit',
] as const;

export type PlatformArch = (typeof PLATFORM_ARCHS)[number];

export const PLATFORM_TYPES = ['mcu', 'qemu', 'sim', 'unit', 'native'] as const;

export type PlatformType = (typeof PLATFORM_TYPES)[number];

/** Placeholder for `type` and `simulation` when a platform leaves them unset. */
export const NOT_APPLICABLE = 'na';

export const DEFAULT_RAM_KB = 128;
export const DEFAULT_FLASH_KB = 512;
export const DEFAULT_TIER = -1;
export const DEFAULT_TIMEOUT_MULTIPLIER = 1.0;
