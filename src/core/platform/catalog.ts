/**
 * Load every platform definition under a directory and query the result.
 */
import * as path from 'node:path';
import { globFiles } from '../../utils/file-system.js';
import { PlatformError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { Platform } from './platform.js';

export interface PlatformCatalog {
  /** Platforms keyed by identifier */
  platforms: Map<string, Platform>;
  /** Definition file each platform was loaded from */
  sources: Map<string, string>;
}

/**
 * Load all platform files below rootDir.
 * Files are loaded in sorted path order; the first load failure is thrown.
 */
export async function loadPlatforms(
  rootDir: string,
  config: Config = getDefaultConfig()
): Promise<PlatformCatalog> {
  const files = await globFiles(config.platforms.include, {
    cwd: path.resolve(rootDir),
    ignore: config.platforms.exclude,
  });
  files.sort();

  const catalog: PlatformCatalog = { platforms: new Map(), sources: new Map() };
  for (const file of files) {
    const platform = Platform.fromFile(file);
    const existing = catalog.sources.get(platform.name);
    if (existing !== undefined) {
      throw new PlatformError(
        ErrorCodes.DUPLICATE_PLATFORM,
        `Platform "${platform.name}" is defined in both ${existing} and ${file}`,
        { name: platform.name, files: [existing, file] }
      );
    }
    catalog.platforms.set(platform.name, platform);
    catalog.sources.set(platform.name, file);
  }

  logger.debug(`Loaded ${catalog.platforms.size} platform(s) from ${rootDir}`);
  return catalog;
}

/**
 * Get a platform by identifier or normalized name.
 */
export function getPlatform(catalog: PlatformCatalog, name: string): Platform | undefined {
  const direct = catalog.platforms.get(name);
  if (direct) {
    return direct;
  }
  for (const platform of catalog.platforms.values()) {
    if (platform.normalizedName === name) {
      return platform;
    }
  }
  return undefined;
}

export function hasPlatform(catalog: PlatformCatalog, name: string): boolean {
  return getPlatform(catalog, name) !== undefined;
}

export function listPlatformNames(catalog: PlatformCatalog): string[] {
  return [...catalog.platforms.keys()].sort();
}

/**
 * Platforms flagged `testing.default`.
 */
export function getDefaultPlatforms(catalog: PlatformCatalog): Platform[] {
  return [...catalog.platforms.values()].filter((platform) => platform.default);
}

/**
 * Simulated platforms that can run here: required environment present and
 * the default simulator runnable.
 */
export function getRunnablePlatforms(catalog: PlatformCatalog): Platform[] {
  return [...catalog.platforms.values()].filter((platform) => {
    if (!platform.envSatisfied) {
      return false;
    }
    const simulator = platform.simulatorByName();
    return simulator !== undefined && simulator.isRunnable();
  });
}
