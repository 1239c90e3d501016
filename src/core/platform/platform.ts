/**
 * Metadata for a single buildable hardware or simulated target.
 * A platform maps directly to the board passed to the build.
 */
import { loadYamlWithSchemaSync } from '../../utils/yaml.js';
import { PlatformError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  DEFAULT_FLASH_KB,
  DEFAULT_RAM_KB,
  DEFAULT_TIER,
  DEFAULT_TIMEOUT_MULTIPLIER,
  NOT_APPLICABLE,
  type PlatformArch,
  type PlatformType,
} from './constants.js';
import {
  PlatformFileSchema,
  type PlatformFile,
  type RenodeSettings,
  type TestingSettings,
} from './schema.js';
import { Simulator } from './simulator.js';
import { resolveSupportedToolchains } from './toolchains.js';

/**
 * Replace every path separator in a platform name with an underscore,
 * e.g. `qemu_x86/atom` becomes `qemu_x86_atom`.
 */
export function normalizePlatformName(name: string): string {
  return name.replace(/\//g, '_');
}

/**
 * Split compound feature tokens (`"a:b"`) into their atomic parts.
 */
export function flattenFeatures(entries: readonly string[]): Set<string> {
  const supported = new Set<string>();
  for (const entry of entries) {
    for (const token of entry.split(':')) {
      supported.add(token);
    }
  }
  return supported;
}

/**
 * True when every listed variable is set to a non-empty value.
 */
export function isEnvSatisfied(
  names: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return names.every((name) => Boolean(env[name]));
}

function readPlatformFile(source: string): PlatformFile {
  try {
    return loadYamlWithSchemaSync(source, PlatformFileSchema);
  } catch (error) {
    if (error instanceof SystemError) {
      const code = error.code === ErrorCodes.SCHEMA_VIOLATION ? ErrorCodes.INVALID_PLATFORM : error.code;
      throw new PlatformError(code, `Failed to load platform from ${source}: ${error.message}`, {
        ...error.details,
        path: source,
      });
    }
    throw error;
  }
}

export class Platform {
  name = '';
  normalizedName = '';
  /** Human-readable board name */
  displayName = '';
  /** Whether sysbuild is used by default on this platform */
  sysbuild = false;
  twister = true;
  /** RAM size in KB */
  ram = DEFAULT_RAM_KB;
  /** Flash size in KB */
  flash = DEFAULT_FLASH_KB;

  timeoutMultiplier = DEFAULT_TIMEOUT_MULTIPLIER;
  ignoreTags: string[] = [];
  onlyTags: string[] = [];
  default = false;
  binaries: string[] = [];
  supported = new Set<string>();

  arch: PlatformArch | '' = '';
  vendor = '';
  tier = DEFAULT_TIER;
  type: PlatformType | typeof NOT_APPLICABLE = NOT_APPLICABLE;

  simulators: Simulator[] = [];
  /** Name of the default simulator */
  simulation: string = NOT_APPLICABLE;
  supportedToolchains: string[] = [];
  env: string[] = [];
  envSatisfied = true;

  uart = '';
  resc = '';

  /**
   * Create a platform and load it from a definition file.
   */
  static fromFile(source: string): Platform {
    const platform = new Platform();
    platform.load(source);
    return platform;
  }

  /**
   * Populate this platform from a definition file.
   *
   * Read, parse and schema errors are thrown as PlatformError. A failed load
   * leaves the instance partially populated; discard it.
   */
  load(source: string): void {
    const data = readPlatformFile(source);

    this.name = data.identifier;
    this.normalizedName = normalizePlatformName(this.name);
    this.displayName = data.name ?? '';
    this.sysbuild = data.sysbuild ?? false;
    this.twister = data.twister ?? true;
    this.ram = data.ram ?? DEFAULT_RAM_KB;
    this.flash = data.flash ?? DEFAULT_FLASH_KB;

    const testing: TestingSettings = data.testing ?? {};
    this.timeoutMultiplier = testing.timeout_multiplier ?? DEFAULT_TIMEOUT_MULTIPLIER;
    this.ignoreTags = testing.ignore_tags ?? [];
    this.onlyTags = testing.only_tags ?? [];
    this.default = testing.default ?? false;
    this.binaries = testing.binaries ?? [];
    const renode: RenodeSettings = testing.renode ?? {};
    this.uart = renode.uart ?? '';
    this.resc = renode.resc ?? '';

    this.supported = flattenFeatures(data.supported ?? []);

    this.arch = data.arch;
    this.vendor = data.vendor ?? '';
    this.tier = data.tier ?? DEFAULT_TIER;
    this.type = data.type ?? NOT_APPLICABLE;

    this.simulators = (data.simulation ?? []).map((entry) => new Simulator(entry));
    const defaultSimulator = this.simulatorByName();
    this.simulation = defaultSimulator ? defaultSimulator.name : NOT_APPLICABLE;

    this.supportedToolchains = resolveSupportedToolchains(data.toolchain, data.arch);

    this.env = data.env ?? [];
    this.envSatisfied = isEnvSatisfied(this.env);

    const log = logger.child('platform');
    log.debug(`Loaded ${this.name} from ${source}`, {
      arch: this.arch,
      simulation: this.simulation,
      toolchains: this.supportedToolchains,
    });
    if (!this.envSatisfied) {
      log.debug(`${this.name} requires unset environment variables`, { env: this.env });
    }
  }

  /**
   * Find a simulator by name. Without a name, returns the default
   * simulator, which is the first one declared.
   */
  simulatorByName(name?: string | null): Simulator | undefined {
    if (name) {
      return this.simulators.find((simulator) => simulator.name === name);
    }
    return this.simulators[0];
  }

  toString(): string {
    return `<${this.name} on ${this.arch}>`;
  }
}
