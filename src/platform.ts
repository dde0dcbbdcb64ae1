import * as path from 'path';
import { CONFIG_DIR_ENV } from './constants';
import { Logger } from './logger';
import { Platform } from './types';

export function detectPlatform(nodePlatform: NodeJS.Platform | string): Platform {
  switch (nodePlatform) {
    case 'darwin':
      return 'darwin';
    case 'linux':
      return 'linux';
    default:
      return 'other';
  }
}

export interface ConfigRootOptions {
  env: NodeJS.ProcessEnv;
  platform: Platform;
  /** Raw platform name, only used for the fallback warning. */
  platformName?: string;
  homeDir: string;
  logger: Logger;
}

/**
 * Directory that holds per-application configuration (editor settings,
 * nvim). `CONFIG_DIR` wins over the platform default.
 */
export function resolveConfigRoot(options: ConfigRootOptions): string {
  const override = options.env[CONFIG_DIR_ENV];
  if (override) {
    return path.resolve(override);
  }

  switch (options.platform) {
    case 'darwin':
      return path.join(options.homeDir, 'Library', 'Application Support');
    case 'linux':
      return path.join(options.homeDir, '.config');
    case 'other':
      options.logger.warn(
        `Unsupported platform ${options.platformName ?? 'unknown'}, defaulting to ~/.config`
      );
      return path.join(options.homeDir, '.config');
  }
}
